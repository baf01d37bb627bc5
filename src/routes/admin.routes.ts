import { Router } from 'express';
import {
  AdminController,
  adminFileParamValidation,
  adminUserListValidation,
  userIdParamValidation,
} from '../controllers/admin.controller';
import { AuthGuards } from '../middleware/auth.middleware';

/**
 * Mounted under /admin. Every route requires an active admin account.
 * Listings grant no download rights.
 */
export const createAdminRouter = (controller: AdminController, guards: AuthGuards): Router => {
  const router = Router();

  router.use(guards.requireAdmin);

  // GET /admin/users/?is_admin=true|false
  router.get('/users/', adminUserListValidation, controller.listUsers);

  // GET /admin/files/
  router.get('/files/', controller.listFiles);

  router.post('/users/:userId/deactivate', userIdParamValidation, controller.deactivateUser);
  router.post('/users/:userId/activate', userIdParamValidation, controller.activateUser);
  router.post('/users/:userId/grant-admin', userIdParamValidation, controller.grantAdmin);
  router.post('/users/:userId/revoke-admin', userIdParamValidation, controller.revokeAdmin);

  // DELETE /admin/users/:userId - Cascades to owned files
  router.delete('/users/:userId', userIdParamValidation, controller.deleteUser);

  // DELETE /admin/files/:fileId
  router.delete('/files/:fileId', adminFileParamValidation, controller.deleteFile);

  return router;
};
