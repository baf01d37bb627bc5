import { Request, Response } from 'express';
import { param } from 'express-validator';
import multer from 'multer';
import { currentUser } from '../middleware/auth.middleware';
import { FileService } from '../services/file.service';
import { FileDTOMapper } from '../types/file-dtos';
import { UserDTOMapper } from '../types/user-dtos';
import { ResponseBuilder, sendServiceError } from '../utils/response-builder';
import { sendView } from '../utils/views';

export const fileIdParamValidation = [
  param('fileId').isInt({ min: 1 }).withMessage('File ID must be a positive integer.').toInt(),
];

/**
 * Parses the multipart `file` field into memory, refusing anything over `maxUploadBytes`.
 */
export const createUploadParser = (maxUploadBytes: number) =>
  multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  }).single('file');

/**
 * multer hands over multipart filename parameters decoded as latin1.
 * Re-reads the bytes as UTF-8 unless that would not round-trip.
 */
export const decodeUploadFilename = (name: string): string => {
  if (/[^\u0000-\u00ff]/.test(name)) return name;
  const decoded = Buffer.from(name, 'latin1').toString('utf8');
  return decoded.includes('\ufffd') ? name : decoded;
};

export const createFileController = ({ fileService }: { fileService: FileService }) => {
  /**
   * Stores a multipart upload, optionally addressed to another user. POST /upload/
   */
  const upload = async (req: Request, res: Response): Promise<void> => {
    const owner = currentUser(req);

    if (!req.file) {
      return ResponseBuilder.validationError(res, [{ field: 'file', reason: 'File is required.' }]);
    }

    const recipient: unknown = req.body?.recipient_username;
    const recipientUsername = typeof recipient === 'string' && recipient.trim() ? recipient.trim() : undefined;

    try {
      const record = await fileService.upload(owner, {
        originalName: decodeUploadFilename(req.file.originalname),
        mimeType: req.file.mimetype,
        data: req.file.buffer,
        recipientUsername,
      });

      // Browsers posting the dashboard form get sent back to it
      if (req.accepts(['html', 'json']) === 'json') {
        return ResponseBuilder.success(
          res,
          {
            message: 'File uploaded successfully',
            original_filename: record.filename,
            saved_filename: record.storedFilename,
          },
          201
        );
      }
      return res.redirect(303, '/dashboard');
    } catch (error: unknown) {
      return sendServiceError(res, error, 'Upload');
    }
  };

  /**
   * Streams a stored file back to its owner or recipient. GET /download/:storedFilename
   */
  const download = async (req: Request, res: Response): Promise<void> => {
    try {
      const { file, data } = await fileService.prepareDownload(
        req.params.storedFilename,
        currentUser(req)
      );

      res.attachment(file.filename);
      res.type(file.mimeType || 'application/octet-stream');
      res.send(data);
    } catch (error: unknown) {
      return sendServiceError(res, error, 'Download');
    }
  };

  /** GET /received-files/ */
  const listReceived = async (req: Request, res: Response): Promise<void> => {
    try {
      const files = await fileService.listReceived(currentUser(req));
      return ResponseBuilder.success(res, files.map(file => FileDTOMapper.toReceivedDTO(file)));
    } catch (error: unknown) {
      return sendServiceError(res, error, 'Received files listing');
    }
  };

  /** GET /files/ */
  const listOwned = async (req: Request, res: Response): Promise<void> => {
    try {
      const files = await fileService.listOwned(currentUser(req));
      return ResponseBuilder.success(res, files.map(file => FileDTOMapper.toOwnedDTO(file)));
    } catch (error: unknown) {
      return sendServiceError(res, error, 'Owned files listing');
    }
  };

  /** DELETE /files/:fileId */
  const deleteOwned = async (req: Request, res: Response): Promise<void> => {
    if (ResponseBuilder.rejectInvalid(req, res)) return;

    try {
      await fileService.deleteOwned(currentUser(req), Number(req.params.fileId));
      res.status(204).send();
    } catch (error: unknown) {
      return sendServiceError(res, error, 'File deletion');
    }
  };

  /** GET /dashboard */
  const dashboard = async (req: Request, res: Response): Promise<void> => {
    const user = currentUser(req);
    try {
      const [owned, received] = await Promise.all([
        fileService.listOwned(user),
        fileService.listReceived(user),
      ]);
      return sendView(res, 'dashboard', {
        title: 'Dashboard',
        currentUser: UserDTOMapper.toDTO(user),
        ownedFiles: owned.map(file => FileDTOMapper.toOwnedDTO(file)),
        receivedFiles: received.map(file => FileDTOMapper.toReceivedDTO(file)),
      });
    } catch (error: unknown) {
      return sendServiceError(res, error, 'Dashboard');
    }
  };

  return { upload, download, listReceived, listOwned, deleteOwned, dashboard };
};

export type FileController = ReturnType<typeof createFileController>;
