import mongoose from 'mongoose';
import { DatabaseConfig } from './config';
import logger from '../common/utils/logger';
import { DatabaseConnectionError } from '../common/errors/backfillErrors';

export const connectDB = async (database: DatabaseConfig) => {
  try {
    await mongoose.connect(`mongodb://${database.host}:${database.port}`, {
      dbName: database.name,
      user: database.user,
      pass: database.password,
      authSource: database.authSource,
      serverSelectionTimeoutMS: 10_000,
    });
    logger.info({ host: database.host, db: database.name }, 'MongoDB connected successfully');
  } catch (error) {
    logger.error({ err: error }, 'MongoDB connection error');
    throw new DatabaseConnectionError(`Could not connect to MongoDB at ${database.host}:${database.port}`, error);
  }
};

export const disconnectDB = async () => {
  await mongoose.disconnect();
  logger.info('MongoDB connection closed');
};
