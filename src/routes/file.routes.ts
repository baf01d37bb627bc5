import { Router } from 'express';
import {
  FileController,
  createUploadParser,
  fileIdParamValidation,
} from '../controllers/file.controller';
import { AuthGuards } from '../middleware/auth.middleware';
import { RateLimiters } from '../middleware/rateLimit.middleware';

export const createFileRouter = (
  controller: FileController,
  guards: AuthGuards,
  options: { maxUploadBytes: number; limiters: RateLimiters }
): Router => {
  const router = Router();

  // Uploads are held in memory up to the configured limit, then handed to the blob store
  const uploadParser = createUploadParser(options.maxUploadBytes);

  // POST /upload/ - Multipart `file` plus optional `recipient_username`
  router.post(
    '/upload/',
    guards.authenticate,
    options.limiters.upload,
    uploadParser,
    controller.upload
  );

  // GET /download/:storedFilename - Owner or recipient only
  router.get('/download/:storedFilename', guards.authenticate, controller.download);

  // GET /received-files/ - Files addressed to the caller
  router.get('/received-files/', guards.authenticate, controller.listReceived);

  // GET /files/ - Caller's own uploads
  router.get('/files/', guards.authenticate, controller.listOwned);

  // DELETE /files/:fileId - Owner removes an upload
  router.delete('/files/:fileId', guards.authenticate, fileIdParamValidation, controller.deleteOwned);

  return router;
};
