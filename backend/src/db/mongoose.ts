/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';
import { moduleLogger } from '../core/logger.js';

export { mongoose };

const log = moduleLogger('db');

export async function connectMongo(url: string): Promise<void> {
  if (mongoose.connection.readyState === 1) return;

  mongoose.set('strictQuery', true);
  await mongoose.connect(url, {
    serverSelectionTimeoutMS: 10_000,
  });
  log.info({ db: mongoose.connection.name }, 'MongoDB connected');
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  log.info('MongoDB disconnected');
}
