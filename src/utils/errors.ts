/**
 * Failure codes raised by the service layer. Controllers translate them into HTTP responses.
 */
export type ServiceErrorCode =
  | 'InvalidCredentials'
  | 'AccountInactive'
  | 'EmailAlreadyExists'
  | 'UsernameTaken'
  | 'UsernameExhausted'
  | 'StoredFilenameTaken'
  | 'UserNotFound'
  | 'RecipientNotFound'
  | 'FileNotFound'
  | 'BlobNotFound'
  | 'PermissionDenied'
  | 'CannotModifySelf'
  | 'PasswordEmpty'
  | 'PasswordTooLong';

export class ServiceError extends Error {
  public readonly code: ServiceErrorCode;

  constructor(code: ServiceErrorCode, detail?: string) {
    super(detail ? `${code}: ${detail}` : code);
    this.name = 'ServiceError';
    this.code = code;
  }
}

export const isServiceError = (error: unknown, code?: ServiceErrorCode): error is ServiceError =>
  error instanceof ServiceError && (code === undefined || error.code === code);

/** Human-readable message for logging an unknown thrown value. */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
