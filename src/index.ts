import { createApp } from './app';
import { env } from './config';
import { logger, Logging, connectDatabase, disconnectDatabase } from './utils';
import { disconnectRedis, getRedisClient } from './redis';
import { closeReconciliationQueue, processRunJob, setupReconciliationWorker } from './workers';

/**
 * Connects PostgreSQL (and Redis when enabled), starts the queue worker and
 * binds the HTTP server
 */
const startServer = async (): Promise<void> => {
  try {
    await connectDatabase();

    // Connect early so the log shows whether the run mirror is available
    getRedisClient();

    // Queue worker only with Redis; otherwise runs execute in-process
    const worker = env.REDIS_ENABLED ? setupReconciliationWorker(processRunJob) : null;
    if (worker) {
      logger.info('👷 Reconciliation worker initialized');
    } else {
      logger.info('Redis disabled: reconciliation runs execute in-process');
    }

    const app = createApp();

    const server = app.listen(env.PORT, () => {
      Logging.box('🚀 INTERUNIT LOAN RECON', `Server started in ${env.NODE_ENV} mode`);
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
    });

    // BullMQ before Redis, the pool last
    const closeResources = async (): Promise<void> => {
      if (worker) {
        await worker.close();
      }
      await closeReconciliationQueue();
      await disconnectRedis();
      await disconnectDatabase();
    };

    const gracefulShutdown = (signal: string): void => {
      logger.info(`${signal} received. Starting graceful shutdown...`);

      server.close((err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        closeResources().then(
          () => {
            logger.info('Server closed successfully');
            process.exit(0);
          },
          (closeError: unknown) => {
            logger.error('Error while closing resources:', closeError);
            process.exit(1);
          }
        );
      });

      // In-flight runs get 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown due to timeout');
        process.exit(1);
      }, 30000).unref();
    };

    // Handle termination signals
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    // Handle uncaught exceptions
    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception:', err);
      process.exit(1);
    });

    // Handle unhandled promise rejections
    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Rejection:', reason);
      process.exit(1);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start server
void startServer();
