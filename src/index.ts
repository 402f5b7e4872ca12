import { createServer } from 'http';
import { env, validateEnv } from '@/shared/config';
import { logger } from '@/shared/utils';
import { cuidController } from '@/modules/cuid';
import { createApp } from './app';

// Validate environment variables
try {
  validateEnv();
} catch (error) {
  logger.error('Environment validation failed', error);
  process.exit(1);
}

// Fingerprint failures are fatal, so surface them before accepting traffic
try {
  cuidController.getDefaultHandle();
} catch (error) {
  logger.error('Default generator could not be created', error);
  process.exit(1);
}

const httpServer = createServer(createApp(cuidController));

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    await new Promise<void>((resolve) => {
      const forceClose = setTimeout(() => {
        logger.warn('HTTP server force closed after timeout');
        resolve();
      }, 5000);

      httpServer.close(() => {
        clearTimeout(forceClose);
        logger.info('HTTP server closed');
        resolve();
      });
    });

    cuidController.shutdown();

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown', error);
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', { reason });
  void gracefulShutdown('UNHANDLED_REJECTION');
});

// Start server
httpServer.listen(env.PORT, () => {
  logger.info('CUID service started', {
    port: env.PORT,
    environment: env.NODE_ENV,
  });
});
