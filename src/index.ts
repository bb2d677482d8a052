/**
 * Keyword Monitor
 *
 * Entry point for the application.
 * Handles process signals for graceful shutdown.
 */

import { App } from './app.js';
import { loadEnvConfig } from './config.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

let app: App | null = null;

// Graceful shutdown handler
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, initiating graceful shutdown...`);

  try {
    await app?.stop(`Received ${signal}`);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: errorMessage(error) });
    process.exit(1);
  }
}

// Register signal handlers
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  shutdown('uncaughtException').catch(() => process.exit(1));
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
});

// Start the application
async function main(): Promise<void> {
  try {
    logger.info('='.repeat(50));
    logger.info('Telegram Keyword Monitor');
    logger.info('='.repeat(50));

    const config = loadEnvConfig();
    app = await App.create(config);
    await app.start();

    // Log status periodically
    setInterval(() => {
      if (app) {
        logger.debug('Application status', { ...app.getStatus() });
      }
    }, 60000).unref();
  } catch (error) {
    logger.error('Failed to start application', { error: errorMessage(error) });
    process.exit(1);
  }
}

// Run
void main();
