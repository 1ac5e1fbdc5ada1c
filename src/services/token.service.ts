import jwt from 'jsonwebtoken';
import type { CookieOptions, Response } from 'express';
import { UnauthorizedError } from '../utils/customErrors';
import logger from '../utils/logger';

export const ACCESS_TOKEN_COOKIE = 'accessToken';

export interface TokenPayload {
  userId: string;
  username: string;
}

export interface TokenServiceOptions {
  secret: string;
  ttlSeconds: number;
  secureCookies: boolean;
}

class TokenService {
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly secureCookies: boolean;

  constructor({ secret, ttlSeconds, secureCookies }: TokenServiceOptions) {
    if (!secret) {
      throw new Error('JWT secret must be defined in environment variables');
    }

    this.secret = secret;
    this.ttlSeconds = ttlSeconds;
    this.secureCookies = secureCookies;
  }

  generateAccessToken(payload: TokenPayload): string {
    return jwt.sign({ username: payload.username }, this.secret, {
      subject: payload.userId,
      expiresIn: this.ttlSeconds,
    });
  }

  async verifyAccessToken(token: string): Promise<TokenPayload> {
    try {
      const decoded = jwt.verify(token, this.secret);
      if (
        typeof decoded === 'string' ||
        typeof decoded.sub !== 'string' ||
        typeof decoded.username !== 'string'
      ) {
        throw new UnauthorizedError('Malformed access token');
      }
      return { userId: decoded.sub, username: decoded.username };
    } catch (error) {
      logger.debug(
        `Access token rejected: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
      throw new UnauthorizedError('Invalid access token');
    }
  }

  setAccessTokenCookie(res: Response, token: string): void {
    res.cookie(ACCESS_TOKEN_COOKIE, token, this.cookieOptions());
  }

  clearAccessTokenCookie(res: Response): void {
    res.clearCookie(ACCESS_TOKEN_COOKIE, { ...this.cookieOptions(), maxAge: undefined });
  }

  private cookieOptions(): CookieOptions {
    return {
      httpOnly: true,
      secure: this.secureCookies,
      sameSite: 'lax',
      maxAge: this.ttlSeconds * 1000,
      path: '/',
    };
  }
}

export default TokenService;
