import { Request, Response, NextFunction, RequestHandler } from 'express';
import { IRateLimitOptions, IRateLimitSet, ILimit } from '../config/rateLimits';
import { ErrorCode } from '../types/error-dtos';
import { ResponseBuilder } from '../utils/response-builder';
import { attachedUser } from './auth.middleware';

const SWEEP_INTERVAL_MS = 60 * 1000;

interface ICacheEntry {
  count: number;
  resetTime: number; // Unix timestamp (ms)
}

/**
 * In-process fixed-window counters. Expired windows are swept at most once a minute.
 */
export class RateLimitStore {
  private readonly entries = new Map<string, ICacheEntry>();
  private nextSweep = 0;

  /** Counts one request. Returns the seconds to wait when the limit is already used up. */
  public hit(key: string, { limit, windowMs }: ILimit, now: number): { retryAfter: number } | null {
    this.sweep(now);

    const entry = this.entries.get(key);
    if (!entry || entry.resetTime <= now) {
      this.entries.set(key, { count: 1, resetTime: now + windowMs });
      return null;
    }

    if (entry.count >= limit) {
      return { retryAfter: Math.ceil((entry.resetTime - now) / 1000) };
    }

    entry.count += 1;
    return null;
  }

  public get size(): number {
    return this.entries.size;
  }

  private sweep(now: number): void {
    if (now < this.nextSweep) return;
    for (const [key, entry] of this.entries) {
      if (entry.resetTime <= now) this.entries.delete(key);
    }
    this.nextSweep = now + SWEEP_INTERVAL_MS;
  }
}

/**
 * Middleware generator for IP and user based fixed-window rate limiting.
 * Mount after `authenticate` to count per user instead of per IP.
 * Every route sharing one returned handler shares its counters.
 */
export const rateLimiter = (
  options: IRateLimitOptions,
  clock: () => number = Date.now,
  store: RateLimitStore = new RateLimitStore()
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    // 1. Determine Key and Limit Type (User ID takes precedence over IP)
    let key = `ip_${req.ip ?? 'unknown'}`;
    let limitConfig: ILimit | undefined = options.ipLimit;

    const user = attachedUser(req);
    if (user) {
      key = `user_${user.id}`;
      limitConfig = options.userLimit || options.ipLimit;
    }

    if (!limitConfig) {
      return next(); // No limit defined for this route/user type
    }

    // 2. Count and check
    const blocked = store.hit(key, limitConfig, clock());
    if (blocked) {
      res.setHeader('Retry-After', blocked.retryAfter);
      return ResponseBuilder.error(res, ErrorCode.RATE_LIMIT_EXCEEDED, options.message, 429);
    }

    next();
  };
};

export interface RateLimiters {
  credentials: RequestHandler;
  registration: RequestHandler;
  upload: RequestHandler;
}

/** One limiter per concern, shared by the JSON and HTML routes that guard the same thing. */
export const createRateLimiters = (limits: IRateLimitSet): RateLimiters => ({
  credentials: rateLimiter(limits.credentials),
  registration: rateLimiter(limits.registration),
  upload: rateLimiter(limits.upload),
});
