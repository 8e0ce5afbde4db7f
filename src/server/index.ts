/**
 * Development server entry point
 */

import dotenv from 'dotenv';
import { createApp } from './app.js';
import { SessionRegistry } from './services/session-registry.js';
import { getLogger, initLogger } from '../utils/logger.js';
import { messageOf } from '../utils/errors.js';

// Load environment variables
dotenv.config();

// Initialize logger
const debug = process.env.DEBUG === 'true';
initLogger({ debug });
const logger = getLogger();

const registry = new SessionRegistry({
  pollsUntilDone: process.env.POLLS_UNTIL_DONE ? Number(process.env.POLLS_UNTIL_DONE) : undefined,
});
const app = createApp(registry, { debug });

// Start server
const PORT = Number(process.env.PORT || 8000);
const server = app.listen(PORT, () => {
  logger.info(`Transcription upload server listening on port ${PORT}`, {
    env: process.env.NODE_ENV || 'development',
  });
});

// Graceful shutdown
const shutdown = (signal: string) => {
  logger.info(`Received ${signal}, starting graceful shutdown`);

  registry.cleanupAll();

  // Stop accepting new connections
  server.close((error) => {
    if (error) {
      logger.error('Error while closing HTTP server', { error: error.message });
      process.exit(1);
    }
    logger.info('HTTP server closed');
    process.exit(0);
  });
};

// Handle shutdown signals
process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', {
    error: error.message,
    stack: error.stack,
  });
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', { reason: messageOf(reason) });
  process.exit(1);
});
