import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cookieParser from 'cookie-parser';
import morgan from 'morgan';
import compression from 'compression';
import createRoutes from './routes/index';
import errorHandler from './middleware/errorHandler';
import notFound from './middleware/notFound';
import { authenticate } from './middleware/auth.middleware';
import { coversDirectory, createCoverUpload } from './middleware/uploadCover';
import { buildCorsOptions, helmetOptions, rateLimitOptions } from './utils/securityConfig';
import logger from './utils/logger';
import type { AppConfig } from './utils/validateEnv';
import type { Repositories } from './repositories/index';
import TokenService from './services/token.service';
import AuthService from './services/auth.service';
import AuthController from './controllers/auth.controller';
import BookService from './Books/services/book.service';
import BookController from './Books/controllers/book.controller';
import AuthorService from './Books/services/author.service';
import AuthorController from './Books/controllers/author.controller';

export interface AppDependencies {
  config: AppConfig;
  repositories: Repositories;
}

export const createApp = ({ config, repositories }: AppDependencies): Application => {
  const tokenService = new TokenService({
    secret: config.JWT_ACCESS_SECRET,
    ttlSeconds: config.JWT_ACCESS_TTL,
    secureCookies: config.isProduction,
  });
  const authService = new AuthService(repositories.users, tokenService);
  const bookService = new BookService(repositories.books, repositories.authors);
  const authorService = new AuthorService(repositories.authors);

  const app: Application = express();

  app.set('trust proxy', 1);

  app.use(compression());
  app.use(helmet(helmetOptions));
  app.use(cors(buildCorsOptions(config.FRONTEND_URL)));
  app.use(rateLimit(rateLimitOptions));
  app.use(cookieParser());
  app.use(
    morgan('combined', {
      stream: {
        write: (message: string) => {
          logger.info(message.trim());
        },
      },
    })
  );

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use('/covers', express.static(coversDirectory(config.UPLOADS_DIR)));

  app.use(authenticate(tokenService, repositories.users));
  app.use(
    '/',
    createRoutes({
      authController: new AuthController(authService, tokenService),
      bookController: new BookController(bookService),
      authorController: new AuthorController(authorService),
      coverUpload: createCoverUpload(config.UPLOADS_DIR),
    })
  );

  app.use(notFound);
  app.use(errorHandler);

  return app;
};

export default createApp;
