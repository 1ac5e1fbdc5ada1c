import { RequestHandler, Router } from 'express';
import type BookController from '../controllers/book.controller';
import { requireLogin, requirePermission } from '../../middleware/auth.middleware';
import { Permission } from '../../model/user.model';

// Access checks run before the upload handler so rejected requests store nothing.
const createBookRoutes = (bookController: BookController, coverUpload: RequestHandler): Router => {
  const router = Router();

  router.get('/list', bookController.list);
  router.get('/stats', bookController.stats);

  router
    .route('/form')
    .get(requireLogin, bookController.showCreateForm)
    .post(requireLogin, coverUpload, bookController.create);

  router.get('/:id/detail', requireLogin, bookController.detail);

  const canChange = requirePermission(Permission.CHANGE_BOOK);
  router
    .route('/:id/edit')
    .get(canChange, bookController.showEditForm)
    .post(canChange, coverUpload, bookController.update);

  const canDelete = requirePermission(Permission.DELETE_BOOK);
  router
    .route('/:id/delete')
    .get(canDelete, bookController.confirmDelete)
    .post(canDelete, bookController.remove);

  return router;
};

export default createBookRoutes;
