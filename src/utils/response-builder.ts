import { Request, Response } from 'express';
import { validationResult } from 'express-validator';
import { APIErrorResponse, ErrorCode, ErrorDetail } from '../types/error-dtos';
import { ServiceErrorCode, describeError, isServiceError } from './errors';
import { logger } from './logger';

export class ResponseBuilder {
  /**
   * Sends a success response
   */
  static success<T>(res: Response, data: T, statusCode: number = 200): void {
    res.status(statusCode).json(data);
  }

  /**
   * Sends an error response
   */
  static error(
    res: Response,
    code: ErrorCode,
    message: string,
    statusCode: number,
    details?: ErrorDetail[]
  ): void {
    const errorResponse: APIErrorResponse = {
      error: {
        code,
        message,
        details,
        timestamp: new Date().toISOString(),
      },
    };

    res.status(statusCode).json(errorResponse);
  }

  /**
   * 404 Not Found shortcut
   */
  static notFound(res: Response, resource: string = 'Resource'): void {
    this.error(res, ErrorCode.NOT_FOUND, `${resource} not found`, 404);
  }

  /**
   * 401 Unauthorized shortcut. Always advertises the bearer scheme.
   */
  static unauthorized(
    res: Response,
    message: string = 'Could not validate credentials',
    code: ErrorCode = ErrorCode.UNAUTHORIZED
  ): void {
    res.setHeader('WWW-Authenticate', 'Bearer');
    this.error(res, code, message, 401);
  }

  /**
   * 403 Forbidden shortcut
   */
  static forbidden(res: Response, message: string = 'Permission denied'): void {
    this.error(res, ErrorCode.PERMISSION_DENIED, message, 403);
  }

  /**
   * 422 Validation Error
   */
  static validationError(res: Response, details: ErrorDetail[]): void {
    this.error(res, ErrorCode.VALIDATION_ERROR, 'Input validation failed', 422, details);
  }

  /**
   * Sends a 422 built from express-validator results.
   * @returns true when a response was sent and the handler must stop.
   */
  static rejectInvalid(req: Request, res: Response): boolean {
    const errors = validationResult(req);
    if (errors.isEmpty()) return false;

    this.validationError(
      res,
      errors.array().map(err => ({
        field: err.type === 'field' ? err.path : undefined,
        reason: String(err.msg),
        value: err.type === 'field' && err.path !== 'password' ? err.value : undefined,
      }))
    );
    return true;
  }
}

type ServiceErrorResponse = { status: number; code: ErrorCode; message: string };

const SERVICE_ERROR_RESPONSES: Partial<Record<ServiceErrorCode, ServiceErrorResponse>> = {
  InvalidCredentials: {
    status: 401,
    code: ErrorCode.INVALID_CREDENTIALS,
    message: 'Incorrect username or password',
  },
  AccountInactive: { status: 403, code: ErrorCode.ACCOUNT_INACTIVE, message: 'Inactive user.' },
  EmailAlreadyExists: {
    status: 409,
    code: ErrorCode.ALREADY_EXISTS,
    message: 'Email already registered.',
  },
  UserNotFound: { status: 404, code: ErrorCode.NOT_FOUND, message: 'User not found' },
  RecipientNotFound: { status: 404, code: ErrorCode.NOT_FOUND, message: 'Recipient not found' },
  FileNotFound: { status: 404, code: ErrorCode.NOT_FOUND, message: 'File not found' },
  // Same body as a missing record
  BlobNotFound: { status: 404, code: ErrorCode.NOT_FOUND, message: 'File not found' },
  PermissionDenied: {
    status: 403,
    code: ErrorCode.PERMISSION_DENIED,
    message: 'You do not have access to this file.',
  },
  CannotModifySelf: {
    status: 409,
    code: ErrorCode.CONFLICT,
    message: 'Admins cannot deactivate, demote or delete their own account.',
  },
};

/**
 * Maps a thrown value from the service layer onto the error envelope.
 * Anything without a mapping is logged and answered with a generic 500.
 */
export const sendServiceError = (res: Response, error: unknown, context: string): void => {
  const mapped = isServiceError(error) ? SERVICE_ERROR_RESPONSES[error.code] : undefined;
  if (mapped) {
    if (mapped.status === 401) {
      res.setHeader('WWW-Authenticate', 'Bearer');
    }
    return ResponseBuilder.error(res, mapped.code, mapped.message, mapped.status);
  }

  logger.error(`${context} failed`, { error: describeError(error) });
  ResponseBuilder.error(res, ErrorCode.INTERNAL_SERVER_ERROR, 'Internal server error.', 500);
};
