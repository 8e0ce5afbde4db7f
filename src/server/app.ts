/**
 * Express app implementing the transcription service's upload API in memory
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import { createHealthRoutes, SERVER_VERSION } from './routes/health.js';
import { createJobRoutes } from './routes/jobs.js';
import { createSessionRoutes } from './routes/sessions.js';
import { SessionRegistry } from './services/session-registry.js';
import { getLogger } from '../utils/logger.js';

export interface AppOptions {
  debug?: boolean;
  maxChunkBytes?: number;
}

export function createApp(
  registry: SessionRegistry = new SessionRegistry(),
  options: AppOptions = {}
): Express {
  const logger = getLogger();
  const debug = options.debug ?? false;
  const app = express();

  // Middleware
  app.use(express.json());

  // Log all requests (if debug mode)
  if (debug) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.url}`);
      next();
    });
  }

  // Mount routes
  app.use('/sessions', createSessionRoutes(registry, { maxChunkBytes: options.maxChunkBytes }));
  app.use('/jobs', createJobRoutes(registry));
  app.use('/health', createHealthRoutes(registry));

  // Root endpoint
  app.get('/', (req: Request, res: Response) => {
    res.json({
      name: 'Transcription Upload Server',
      version: SERVER_VERSION,
      endpoints: {
        health: 'GET /health',
        sessions: {
          init: 'POST /sessions',
          chunk: 'PUT /sessions/:sessionId/chunks/:index',
          finalize: 'POST /sessions/:sessionId/finalize',
          delete: 'DELETE /sessions/:sessionId',
        },
        jobs: {
          status: 'GET /jobs/:jobId',
          cancel: 'DELETE /jobs/:jobId',
        },
      },
    });
  });

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: `Cannot ${req.method} ${req.url}`,
      code: 'not_found',
    });
  });

  // Error handling middleware (body parser failures land here)
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    if (status >= 500) {
      logger.error('Unhandled error', {
        error: err.message,
        url: req.url,
        method: req.method,
      });
    }

    res.status(status).json({
      error: status >= 500 && !debug ? 'An error occurred' : err.message,
    });
  });

  return app;
}

function statusOf(err: Error): number {
  const status: unknown = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 600 ? status : 500;
}
