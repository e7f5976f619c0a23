/**
 * MongoDB connection (mongoose).
 */

import mongoose from 'mongoose';
import type { Logger } from '../common/logger.js';

export { mongoose };

export interface MongoConnectOptions {
  url: string;
  dbName: string;
  logger: Logger;
}

export async function connectMongo(options: MongoConnectOptions): Promise<void> {
  if (mongoose.connection.readyState === 1) return;

  await mongoose.connect(options.url, {
    dbName: options.dbName,
    serverSelectionTimeoutMS: 10_000,
  });
  options.logger.info({ dbName: options.dbName }, '[DB] MongoDB connected');
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
}

const READY_STATES: Record<number, string> = {
  0: 'disconnected',
  1: 'connected',
  2: 'connecting',
  3: 'disconnecting',
};

export function mongoState(): string {
  return READY_STATES[mongoose.connection.readyState] ?? 'unknown';
}
