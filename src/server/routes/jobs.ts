/**
 * Transcription job routes
 */

import { Router, Request, Response } from 'express';
import type { ServerJob } from '../../types/server.js';
import type { SessionRegistry } from '../services/session-registry.js';

export function createJobRoutes(registry: SessionRegistry): Router {
  const router = Router();

  /**
   * GET /jobs/:jobId
   * Job status; each poll advances the simulated job
   */
  router.get('/:jobId', (req: Request, res: Response) => {
    const job = registry.pollJob(req.params.jobId);
    if (!job) {
      res.status(404).json({ error: `Job not found: ${req.params.jobId}`, code: 'job_not_found' });
      return;
    }
    res.json(toStatusResponse(job));
  });

  /**
   * DELETE /jobs/:jobId
   * Cancel a job that has not finished
   */
  router.delete('/:jobId', (req: Request, res: Response) => {
    const job = registry.cancelJob(req.params.jobId);
    if (!job) {
      res.status(404).json({ error: `Job not found: ${req.params.jobId}`, code: 'job_not_found' });
      return;
    }
    res.json(toStatusResponse(job));
  });

  return router;
}

function toStatusResponse(job: ServerJob) {
  return {
    status: job.status,
    result: job.result,
    error: job.error,
  };
}
