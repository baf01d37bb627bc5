export interface APIErrorResponse {
  error: {
    code: string;
    message: string;
    details?: ErrorDetail[];
    timestamp: string;
  };
}

export interface ErrorDetail {
  field?: string;
  reason: string;
  value?: unknown;
}

export enum ErrorCode {
  // Auth errors
  UNAUTHORIZED = 'unauthorized',
  INVALID_CREDENTIALS = 'invalid_credentials',
  PERMISSION_DENIED = 'permission_denied',
  TOKEN_EXPIRED = 'token_expired',
  TOKEN_INVALID = 'token_invalid',
  TOKEN_MALFORMED = 'token_malformed',
  ACCOUNT_INACTIVE = 'account_inactive',

  // Validation errors
  VALIDATION_ERROR = 'validation_error',
  INVALID_INPUT = 'invalid_input',
  PAYLOAD_TOO_LARGE = 'payload_too_large',

  // Resource errors
  NOT_FOUND = 'not_found',
  ALREADY_EXISTS = 'already_exists',
  CONFLICT = 'conflict',

  // System errors
  INTERNAL_SERVER_ERROR = 'internal_server_error',
  RATE_LIMIT_EXCEEDED = 'rate_limit_exceeded',
}
