import { Router } from 'express';
import type AuthorController from '../controllers/author.controller';
import { requirePermission } from '../../middleware/auth.middleware';
import { Permission } from '../../model/user.model';

const createAuthorRoutes = (authorController: AuthorController): Router => {
  const router = Router();

  router
    .route('/authors')
    .get(authorController.list)
    .post(requirePermission(Permission.ADD_BOOK), authorController.create);

  return router;
};

export default createAuthorRoutes;
