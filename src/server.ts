import { Server } from 'http';
import { DEFAULT_DATABASE_NAME, DEFAULT_DATABASE_URL, loadConfig } from './config/env';
import { connectDatabase, disconnectDatabase, ensureDatabaseConnection } from './lib/mongo';
import { MongoDocumentStore } from './lib/mongoDocumentStore';
import { createApp } from './app';
import { logger } from './utils/logger';

const start = async (): Promise<void> => {
  const config = loadConfig();

  const connection = await connectDatabase(
    config.databaseUrl ?? DEFAULT_DATABASE_URL,
    config.databaseName ?? DEFAULT_DATABASE_NAME
  );

  const app = createApp({
    config,
    store: new MongoDocumentStore(connection),
    checkDatabase: () => ensureDatabaseConnection(connection, 1, 500),
  });

  const server: Server = app.listen(config.port, config.host, () => {
    logger.info('Digital store API listening', {
      environment: config.nodeEnv,
      port: config.port,
      host: config.host,
    });
  });

  // Graceful shutdown
  const gracefulShutdown = async (signal: string) => {
    logger.info(`${signal} received. Shutting down gracefully...`);
    try {
      await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
      await disconnectDatabase(connection);
      logger.info('Database connection closed.');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
};

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection, shutting down', reason);
  process.exit(1);
});

start().catch(error => {
  logger.error('Failed to start server', error);
  process.exit(1);
});
