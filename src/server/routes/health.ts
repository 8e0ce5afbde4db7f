/**
 * Health check endpoint
 */

import { Router, Request, Response } from 'express';
import type { HealthCheckResponse } from '../../types/server.js';
import type { SessionRegistry } from '../services/session-registry.js';

export const SERVER_VERSION = '1.0.0';

export function createHealthRoutes(registry: SessionRegistry): Router {
  const router = Router();

  // Track server start time
  const startTime = Date.now();

  /**
   * GET /health
   */
  router.get('/', (req: Request, res: Response) => {
    const health: HealthCheckResponse = {
      status: 'healthy',
      version: SERVER_VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      sessions: registry.getSessionCount(),
      jobs: registry.getJobCount(),
    };
    res.json(health);
  });

  return router;
}
