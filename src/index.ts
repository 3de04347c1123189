import { createApp } from './app';
import { appConfig } from './connections/config/app.config';
import { connectDatabase, migrate, pool, PgDataStore } from './connections';
import { logger } from './utils/logging';

const PORT = appConfig.port;

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  logger.info(`${appConfig.projectName} ${appConfig.version} starting...`);

  logger.info('Connecting to database...');
  await connectDatabase();

  await migrate();

  const app = createApp(new PgDataStore(pool));

  const server = app.listen(PORT, () => {
    logger.info(`Server is running on port ${PORT}`);
    logger.info(`Environment: ${appConfig.nodeEnv}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down...`);
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Error closing database pool', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

startServer().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error('Failed to start server:', { error: err.message, stack: err.stack });
  logger.error('Exiting application...');
  process.exit(1);
});
