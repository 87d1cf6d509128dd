import mongoose from 'mongoose';
import { config } from './config.js';
import { logger } from './logger.js';

export async function connectMongo(uri: string = config.mongoUri): Promise<typeof mongoose> {
  mongoose.set('strictQuery', true);
  mongoose.connection.on('disconnected', () => logger.warn('MongoDB disconnected'));
  return mongoose.connect(uri);
}
