import mongoose from 'mongoose';
import { AppConfig } from './env';
import { logger } from '../utils/logger';

export async function connectDatabase(config: AppConfig): Promise<void> {
  await mongoose.connect(config.mongodbUri, {
    serverSelectionTimeoutMS: config.dbTimeoutMs,
    socketTimeoutMS: config.dbTimeoutMs * 6,
  });
  // Unique indexes back the username/email/stored-filename invariants
  await mongoose.connection.syncIndexes();
  logger.info('MongoDB connected', { host: mongoose.connection.host });
}

export async function disconnectDatabase(): Promise<void> {
  await mongoose.connection.close();
  logger.info('MongoDB connection closed');
}
