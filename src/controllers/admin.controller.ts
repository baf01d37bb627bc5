import { Request, Response } from 'express';
import { param, query } from 'express-validator';
import { currentUser } from '../middleware/auth.middleware';
import { AdminService } from '../services/admin.service';
import { FileDTOMapper } from '../types/file-dtos';
import { UserDTOMapper } from '../types/user-dtos';
import { ResponseBuilder, sendServiceError } from '../utils/response-builder';

// --- Validation Middleware ---

export const adminUserListValidation = [
  query('is_admin').optional().isBoolean().withMessage('is_admin must be true or false.').toBoolean(),
];

export const userIdParamValidation = [
  param('userId').isInt({ min: 1 }).withMessage('User ID must be a positive integer.').toInt(),
];

export const adminFileParamValidation = [
  param('fileId').isInt({ min: 1 }).withMessage('File ID must be a positive integer.').toInt(),
];

export const createAdminController = ({ adminService }: { adminService: AdminService }) => {
  /** Lists accounts, optionally filtered by the admin flag. GET /admin/users/ */
  const listUsers = async (req: Request, res: Response): Promise<void> => {
    if (ResponseBuilder.rejectInvalid(req, res)) return;

    const flag: unknown = req.query.is_admin;
    try {
      const users = await adminService.listUsers(typeof flag === 'boolean' ? { isAdmin: flag } : {});
      return ResponseBuilder.success(res, users.map(user => UserDTOMapper.toAdminDTO(user)));
    } catch (error: unknown) {
      return sendServiceError(res, error, 'Admin user listing');
    }
  };

  /** GET /admin/files/ */
  const listFiles = async (_req: Request, res: Response): Promise<void> => {
    try {
      const files = await adminService.listFiles();
      return ResponseBuilder.success(res, files.map(file => FileDTOMapper.toAdminDTO(file)));
    } catch (error: unknown) {
      return sendServiceError(res, error, 'Admin file listing');
    }
  };

  /**
   * Builds the handler for one of the flag toggles under /admin/users/:userId/.
   */
  const toggle = (
    action: 'setActive' | 'setAdmin',
    value: boolean,
    context: string
  ) => {
    return async (req: Request, res: Response): Promise<void> => {
      if (ResponseBuilder.rejectInvalid(req, res)) return;

      try {
        const user = await adminService[action](currentUser(req), Number(req.params.userId), value);
        return ResponseBuilder.success(res, UserDTOMapper.toAdminDTO(user));
      } catch (error: unknown) {
        return sendServiceError(res, error, context);
      }
    };
  };

  /** DELETE /admin/users/:userId */
  const deleteUser = async (req: Request, res: Response): Promise<void> => {
    if (ResponseBuilder.rejectInvalid(req, res)) return;

    try {
      const { deletedFiles } = await adminService.deleteUser(
        currentUser(req),
        Number(req.params.userId)
      );
      return ResponseBuilder.success(res, { deleted_files: deletedFiles });
    } catch (error: unknown) {
      return sendServiceError(res, error, 'User deletion');
    }
  };

  /** DELETE /admin/files/:fileId */
  const deleteFile = async (req: Request, res: Response): Promise<void> => {
    if (ResponseBuilder.rejectInvalid(req, res)) return;

    try {
      await adminService.deleteFile(currentUser(req), Number(req.params.fileId));
      res.status(204).send();
    } catch (error: unknown) {
      return sendServiceError(res, error, 'Admin file deletion');
    }
  };

  return {
    listUsers,
    listFiles,
    deactivateUser: toggle('setActive', false, 'User deactivation'),
    activateUser: toggle('setActive', true, 'User activation'),
    grantAdmin: toggle('setAdmin', true, 'Admin grant'),
    revokeAdmin: toggle('setAdmin', false, 'Admin revocation'),
    deleteUser,
    deleteFile,
  };
};

export type AdminController = ReturnType<typeof createAdminController>;
