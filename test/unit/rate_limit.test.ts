import { Request, Response, NextFunction } from 'express';
import { RateLimitStore, rateLimiter } from '../../src/middleware/rateLimit.middleware';
import { CREDENTIALS_LIMIT, UPLOAD_LIMIT } from '../../src/config/rateLimits';

describe('Rate Limit Middleware', () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let nextFunction: NextFunction;
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000_000;
    mockRequest = {
      ip: '127.0.0.1',
      headers: {},
    };
    mockResponse = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
      setHeader: jest.fn().mockReturnThis(),
    };
    nextFunction = jest.fn();
  });

  describe('IP-based throttling', () => {
    it('allows requests up to the limit', () => {
      const middleware = rateLimiter(CREDENTIALS_LIMIT, clock);

      for (let i = 0; i < 10; i++) {
        middleware(mockRequest as Request, mockResponse as Response, nextFunction);
      }

      expect(nextFunction).toHaveBeenCalledTimes(10);
      expect(mockResponse.status).not.toHaveBeenCalled();
    });

    it('blocks the request after the limit with Retry-After', () => {
      const middleware = rateLimiter(CREDENTIALS_LIMIT, clock);

      for (let i = 0; i < 10; i++) {
        middleware(mockRequest as Request, mockResponse as Response, nextFunction);
      }
      now += 15_000;
      middleware(mockRequest as Request, mockResponse as Response, nextFunction);

      expect(nextFunction).toHaveBeenCalledTimes(10);
      expect(mockResponse.status).toHaveBeenCalledWith(429);
      expect(mockResponse.setHeader).toHaveBeenCalledWith('Retry-After', 45);
      expect(mockResponse.json).toHaveBeenCalledWith({
        error: {
          code: 'rate_limit_exceeded',
          message: CREDENTIALS_LIMIT.message,
          details: undefined,
          timestamp: expect.any(String),
        },
      });
    });

    it('opens a new window once the old one has passed', () => {
      const middleware = rateLimiter(CREDENTIALS_LIMIT, clock);

      for (let i = 0; i < 11; i++) {
        middleware(mockRequest as Request, mockResponse as Response, nextFunction);
      }
      now += 60_000;
      middleware(mockRequest as Request, mockResponse as Response, nextFunction);

      expect(nextFunction).toHaveBeenCalledTimes(11);
    });

    it('keeps separate counters per limiter instance', () => {
      const first = rateLimiter(CREDENTIALS_LIMIT, clock);
      const second = rateLimiter(CREDENTIALS_LIMIT, clock);

      for (let i = 0; i < 10; i++) {
        first(mockRequest as Request, mockResponse as Response, nextFunction);
      }
      second(mockRequest as Request, mockResponse as Response, nextFunction);

      expect(nextFunction).toHaveBeenCalledTimes(11);
    });
  });

  describe('User-based throttling', () => {
    it('counts per user instead of per IP', () => {
      const middleware = rateLimiter(UPLOAD_LIMIT, clock);
      const base = {
        id: 1,
        username: 'ALICE1',
        email: 'alice@example.com',
        hashedPassword: 'x',
        isActive: true,
        isAdmin: false,
        createdAt: new Date(0),
        updatedAt: new Date(0),
      };

      mockRequest.user = base;
      for (let i = 0; i < 31; i++) {
        middleware(mockRequest as Request, mockResponse as Response, nextFunction);
      }
      expect(nextFunction).toHaveBeenCalledTimes(30);

      // Same IP, different account
      mockRequest.user = { ...base, id: 2, username: 'BOBBY1' };
      middleware(mockRequest as Request, mockResponse as Response, nextFunction);
      expect(nextFunction).toHaveBeenCalledTimes(31);
    });

    it('lets anonymous requests through when only a user limit is set', () => {
      const middleware = rateLimiter(UPLOAD_LIMIT, clock);
      for (let i = 0; i < 50; i++) {
        middleware(mockRequest as Request, mockResponse as Response, nextFunction);
      }
      expect(nextFunction).toHaveBeenCalledTimes(50);
    });
  });
});

describe('RateLimitStore', () => {
  const window = { limit: 2, windowMs: 10_000 };

  it('drops expired windows on the next sweep', () => {
    const store = new RateLimitStore();
    store.hit('ip_a', window, 0);
    store.hit('ip_b', window, 0);
    expect(store.size).toBe(2);

    // Windows have expired but the sweep interval has not
    store.hit('ip_c', window, 30_000);
    expect(store.size).toBe(3);

    store.hit('ip_c', window, 60_000);
    expect(store.size).toBe(1);
  });

  it('reports the wait once the window is used up', () => {
    const store = new RateLimitStore();
    expect(store.hit('ip_a', window, 0)).toBeNull();
    expect(store.hit('ip_a', window, 1_000)).toBeNull();
    expect(store.hit('ip_a', window, 2_500)).toEqual({ retryAfter: 8 });
  });
});
