import type { CorsOptions } from 'cors';
import type { HelmetOptions } from 'helmet';
import type { Options as RateLimitOptions } from 'express-rate-limit';

export const buildCorsOptions = (origin: string): CorsOptions => ({
  origin,
  methods: ['GET', 'POST', 'OPTIONS'],
  credentials: true,
  optionsSuccessStatus: 200,
  allowedHeaders: ['Content-Type', 'Authorization'],
});

export const helmetOptions: HelmetOptions = {
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ['\'self\''],
      imgSrc: ['\'self\'', 'data:'],
      upgradeInsecureRequests: [],
    },
  },
  // Covers are fetched by the front end from another origin.
  crossOriginResourcePolicy: { policy: 'cross-origin' },
  referrerPolicy: {
    policy: 'strict-origin-when-cross-origin',
  },
  hsts: {
    maxAge: 31536000,
    includeSubDomains: true,
  },
  noSniff: true,
  hidePoweredBy: true,
  frameguard: {
    action: 'deny',
  },
};

export const rateLimitOptions: Partial<RateLimitOptions> = {
  windowMs: 15 * 60 * 1000,
  limit: 2000,
  standardHeaders: true,
  legacyHeaders: false,
  message: 'Too many requests from this IP, please try again later.',
  statusCode: 429,
};

export const accountRateLimitOptions: Partial<RateLimitOptions> = {
  ...rateLimitOptions,
  windowMs: 60 * 60 * 1000,
  limit: 50,
  message: 'Too many account requests from this IP, please try again later.',
};
