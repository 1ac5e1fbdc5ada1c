import { RequestHandler, Router } from 'express';
import createAuthRoutes from './auth.routes';
import createBookRoutes from '../Books/routes/book.routes';
import createAuthorRoutes from '../Books/routes/author.routes';
import type AuthController from '../controllers/auth.controller';
import type BookController from '../Books/controllers/book.controller';
import type AuthorController from '../Books/controllers/author.controller';

export interface RouteDependencies {
  authController: AuthController;
  bookController: BookController;
  authorController: AuthorController;
  coverUpload: RequestHandler;
}

const createRoutes = ({
  authController,
  bookController,
  authorController,
  coverUpload,
}: RouteDependencies): Router => {
  const router = Router();

  // Mount route groups
  router.use(createAuthRoutes(authController));
  router.use(createAuthorRoutes(authorController));
  router.use(createBookRoutes(bookController, coverUpload));

  // Root route
  router.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Book Catalog API is running',
    });
  });

  return router;
};

export default createRoutes;
