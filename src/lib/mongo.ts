import mongoose, { Connection, mongo } from 'mongoose';
import { logger } from '../utils/logger';

export async function connectDatabase(uri: string, dbName: string): Promise<Connection> {
  const connection = mongoose.createConnection(uri, {
    dbName,
    serverSelectionTimeoutMS: 5000,
  });
  await connection.asPromise();
  return connection;
}

export function requireDb(connection: { db?: mongo.Db }): mongo.Db {
  const db = connection.db;
  if (!db) {
    throw new Error('Database connection is not open');
  }
  return db;
}

// Connection health check with retry
export async function ensureDatabaseConnection(
  connection: Connection,
  maxRetries = 3,
  delayMs = 1000
): Promise<boolean> {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await requireDb(connection).admin().ping();
      return true;
    } catch (error) {
      logger.error(`Database connection attempt ${attempt}/${maxRetries} failed`, error);
      if (attempt < maxRetries) {
        await new Promise(resolve => setTimeout(resolve, delayMs * attempt));
      }
    }
  }
  return false;
}

// Graceful shutdown
export async function disconnectDatabase(connection: Connection): Promise<void> {
  await connection.close();
}
