import mongoose from 'mongoose';
import type { ILogger } from '@actionindex/types';

/**
 * Connect mongoose to the configured MongoDB deployment.
 *
 * Connection lifecycle events are reported through the given logger.
 */
export async function connectDatabase(uri: string, logger: ILogger): Promise<void> {
  mongoose.connection.on('connected', () => logger.info('MongoDB connected'));
  mongoose.connection.on('error', error => logger.error({ error }, 'MongoDB connection error'));
  mongoose.connection.on('disconnected', () => logger.warn('MongoDB disconnected'));

  await mongoose.connect(uri, {
    maxPoolSize: 20,
    serverSelectionTimeoutMS: 5000
  });
}

export async function disconnectDatabase() {
  await mongoose.disconnect();
}
