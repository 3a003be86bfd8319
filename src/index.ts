import { App } from './app.js';
import { logger } from './middleware/logging.js';
import { getErrorMessage } from './utils/errorHandling.js';

const app = new App();

let shuttingDown = false;

function shutdown(reason: string, exitCode: number): void {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  app
    .stop()
    .then(() => {
      logger.info('Shutdown complete', { reason });
      process.exit(exitCode);
    })
    .catch(shutdownError => {
      logger.error('Failed to gracefully shutdown', { reason, error: getErrorMessage(shutdownError) });
      process.exit(1);
    });
}

// Graceful shutdown handling
process.on('SIGTERM', () => {
  logger.info('Received SIGTERM signal, shutting down gracefully');
  shutdown('SIGTERM', 0);
});

process.on('SIGINT', () => {
  logger.info('Received SIGINT signal, shutting down gracefully');
  shutdown('SIGINT', 0);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection detected', {
    reason:
      reason instanceof Error
        ? { name: reason.name, message: reason.message, stack: reason.stack }
        : reason,
  });
  shutdown('unhandledRejection', 1);
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception detected', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });
  shutdown('uncaughtException', 1);
});

// Start the application
app.start().catch(error => {
  logger.error('Failed to start application', { error: getErrorMessage(error) });
  process.exit(1);
});
