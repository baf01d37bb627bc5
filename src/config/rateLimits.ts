export interface ILimit {
  limit: number; // Max requests
  windowMs: number; // Time window in milliseconds
}

export interface IRateLimitOptions {
  ipLimit?: ILimit;
  userLimit?: ILimit;
  message: string;
}

export interface IRateLimitSet {
  credentials: IRateLimitOptions;
  registration: IRateLimitOptions;
  upload: IRateLimitOptions;
}

// --- Rate Limit Definitions ---

/** Login and token endpoints: brute-force guard on the 10-character keys. */
export const CREDENTIALS_LIMIT: IRateLimitOptions = {
  ipLimit: { limit: 10, windowMs: 60 * 1000 },
  message: 'Too many login attempts. Try again later.',
};

export const REGISTRATION_LIMIT: IRateLimitOptions = {
  ipLimit: { limit: 5, windowMs: 60 * 1000 },
  message: 'Registration rate limit exceeded.',
};

export const UPLOAD_LIMIT: IRateLimitOptions = {
  userLimit: { limit: 30, windowMs: 60 * 1000 },
  message: 'Upload rate limit exceeded.',
};

export const DEFAULT_RATE_LIMITS: IRateLimitSet = {
  credentials: CREDENTIALS_LIMIT,
  registration: REGISTRATION_LIMIT,
  upload: UPLOAD_LIMIT,
};
