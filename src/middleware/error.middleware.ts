import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { ErrorCode } from '../types/error-dtos';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { ResponseBuilder } from '../utils/response-builder';

/** Status carried by body-parser and http-errors style errors. */
const statusOf = (err: unknown): number | undefined => {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const status: unknown = err.status;
  return typeof status === 'number' ? status : undefined;
};

/**
 * 404 Not Found handler
 * Catches all unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  ResponseBuilder.error(res, ErrorCode.NOT_FOUND, `Route not found: ${req.method} ${req.path}`, 404);
}

/**
 * Global error handling middleware
 * Must be registered after all routes
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    return next(err);
  }

  // Upload limits enforced by multer
  if (err instanceof MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      return ResponseBuilder.error(res, ErrorCode.PAYLOAD_TOO_LARGE, 'File too large.', 413);
    }
    return ResponseBuilder.error(res, ErrorCode.INVALID_INPUT, err.message, 400);
  }

  // Body parsing failures (malformed JSON, oversized bodies)
  const status = statusOf(err);
  if (status === 413) {
    return ResponseBuilder.error(res, ErrorCode.PAYLOAD_TOO_LARGE, 'Request body too large.', 413);
  }
  if (status !== undefined && status >= 400 && status < 500) {
    return ResponseBuilder.error(res, ErrorCode.INVALID_INPUT, 'Malformed request.', 400);
  }

  logger.error('Unhandled error', {
    method: req.method,
    path: req.path,
    error: describeError(err),
  });
  ResponseBuilder.error(res, ErrorCode.INTERNAL_SERVER_ERROR, 'Internal server error.', 500);
}
