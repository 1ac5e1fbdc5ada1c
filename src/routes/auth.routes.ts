import { Router } from 'express';
import rateLimit from 'express-rate-limit';
import type AuthController from '../controllers/auth.controller';
import { accountRateLimitOptions } from '../utils/securityConfig';

const createAuthRoutes = (authController: AuthController): Router => {
  const router = Router();
  const accountLimit = rateLimit(accountRateLimitOptions);

  router
    .route('/register')
    .get(authController.showRegisterForm)
    .post(accountLimit, authController.register);
  router
    .route('/login')
    .get(authController.showLoginForm)
    .post(accountLimit, authController.login);
  router.route('/logout').get(authController.logout).post(authController.logout);

  return router;
};

export default createAuthRoutes;
