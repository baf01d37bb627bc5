import { Application } from 'express';
import { createApp } from '../../src/app';
import { AppConfig } from '../../src/config/env';
import { IRateLimitSet } from '../../src/config/rateLimits';
import { InMemoryBlobStore, InMemoryFileRepository, InMemoryUserRepository } from './inMemoryStores';

export const TEST_SECRET = 'test-secret-test-secret-test-secret';

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  nodeEnv: 'test',
  port: 0,
  mongodbUri: 'mongodb://unused',
  dbTimeoutMs: 1000,
  jwt: { secret: TEST_SECRET, algorithm: 'HS256', accessTokenTtlMinutes: 30 },
  uploadDir: '/unused',
  maxUploadBytes: 1024,
  bcryptRounds: 4,
  logLevel: 'error',
  ...overrides,
});

const generous = { limit: 1000, windowMs: 60 * 1000 };

export const RELAXED_LIMITS: IRateLimitSet = {
  credentials: { ipLimit: generous, message: 'limited' },
  registration: { ipLimit: generous, message: 'limited' },
  upload: { userLimit: generous, message: 'limited' },
};

export interface TestContext {
  app: Application;
  users: InMemoryUserRepository;
  files: InMemoryFileRepository;
  blobs: InMemoryBlobStore;
  config: AppConfig;
}

export const buildTestApp = (
  options: { config?: AppConfig; rateLimits?: IRateLimitSet; clock?: () => number } = {}
): TestContext => {
  const users = new InMemoryUserRepository();
  const files = new InMemoryFileRepository();
  const blobs = new InMemoryBlobStore();
  const config = options.config ?? testConfig();
  const app = createApp({
    config,
    users,
    files,
    blobs,
    rateLimits: options.rateLimits ?? RELAXED_LIMITS,
    clock: options.clock,
  });
  return { app, users, files, blobs, config };
};
