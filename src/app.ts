import express, { Application, Request, Response, NextFunction } from 'express';
import { Server } from 'http';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import helmet from 'helmet';
import { AppConfig } from './config/env';
import { DEFAULT_RATE_LIMITS, IRateLimitSet } from './config/rateLimits';
import { createAdminController } from './controllers/admin.controller';
import { createAuthController } from './controllers/auth.controller';
import { createFileController } from './controllers/file.controller';
import { createAuthGuards } from './middleware/auth.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createRateLimiters } from './middleware/rateLimit.middleware';
import { FileRepository } from './repositories/file.repository';
import { UserRepository } from './repositories/user.repository';
import { createAdminRouter } from './routes/admin.routes';
import { createAuthRouter } from './routes/auth.routes';
import { createFileRouter } from './routes/file.routes';
import { createWebRouter } from './routes/web.routes';
import { AdminService } from './services/admin.service';
import { AuthService } from './services/auth.service';
import { FileService } from './services/file.service';
import { Clock, TokenService } from './services/token.service';
import { BlobStore } from './storage/blob.store';
import { describeError } from './utils/errors';
import { logRequest, logger } from './utils/logger';
import { PasswordHasher } from './utils/passwordHasher';

export interface AppDependencies {
  config: AppConfig;
  users: UserRepository;
  files: FileRepository;
  blobs: BlobStore;
  /** Overrides the default limits, e.g. to loosen them in tests. */
  rateLimits?: IRateLimitSet;
  clock?: Clock;
}

/**
 * Create and configure the Express application around the given stores.
 */
export function createApp(deps: AppDependencies): Application {
  const { config, users, files, blobs } = deps;
  const limiters = createRateLimiters(deps.rateLimits ?? DEFAULT_RATE_LIMITS);

  // Services
  const hasher = new PasswordHasher(config.bcryptRounds);
  const tokens = new TokenService(config, deps.clock);
  const authService = new AuthService(users, hasher, tokens, config);
  const fileService = new FileService(files, users, blobs);
  const adminService = new AdminService(users, files, blobs);
  const guards = createAuthGuards(authService);

  const authController = createAuthController({ authService, config });
  const fileController = createFileController({ fileService });
  const adminController = createAdminController({ adminService });

  const app = express();
  app.disable('x-powered-by');

  // Security Middleware
  app.use(helmet());
  app.use(cors());

  // Body Parsing Middleware
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));
  app.use(cookieParser());

  // Request Logging Middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    res.on('finish', () => {
      logRequest(req.method, req.path, res.statusCode, Date.now() - startTime);
    });
    next();
  });

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use(createWebRouter(authController, fileController, guards, limiters));
  app.use(createAuthRouter(authController, guards, limiters));
  app.use(
    createFileRouter(fileController, guards, { maxUploadBytes: config.maxUploadBytes, limiters })
  );
  app.use('/admin', createAdminRouter(adminController, guards));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Starts listening and resolves once the port is bound.
 * Bind failures such as EADDRINUSE reject instead of surfacing as an unhandled 'error' event.
 */
export function listen(app: Application, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      server.on('error', (error: Error) => {
        logger.error('HTTP server error', { error: describeError(error) });
      });
      resolve(server);
    });
  });
}
