import { createApp, listen } from './app';
import { connectDatabase, disconnectDatabase } from './config/database';
import { ConfigError, loadConfigFromEnvironment } from './config/env';
import { MongoFileRepository } from './repositories/file.repository';
import { MongoUserRepository } from './repositories/user.repository';
import { LocalBlobStore } from './storage/blob.store';
import { describeError } from './utils/errors';
import { logger } from './utils/logger';

// Start server
async function startServer(): Promise<void> {
  const config = loadConfigFromEnvironment();
  logger.setLevel(config.logLevel);

  const blobs = new LocalBlobStore(config.uploadDir);
  await blobs.init();

  // Connect to database
  await connectDatabase(config);

  const app = createApp({
    config,
    users: new MongoUserRepository(),
    files: new MongoFileRepository(),
    blobs,
  });

  // Start listening
  const server = await listen(app, config.port).catch(async (error: unknown) => {
    await disconnectDatabase();
    throw error;
  });
  logger.info('Server running', { port: config.port, environment: config.nodeEnv });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      disconnectDatabase()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close database connection', { error: describeError(error) });
          process.exit(1);
        });
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

startServer().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error('Invalid configuration', { problems: error.problems });
  } else {
    logger.error('Failed to start server', { error: describeError(error) });
  }
  process.exit(1);
});
