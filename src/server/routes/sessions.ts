/**
 * Upload session routes
 */

import express, { Router, Request, Response } from 'express';
import { CHUNK_LENGTH_HEADER, CHUNK_OFFSET_HEADER } from '../../types/api.js';
import {
  FinalizeSessionRequestSchema,
  InitSessionRequestSchema,
} from '../../types/server.js';
import { RegistryError, type SessionRegistry } from '../services/session-registry.js';
import { sendError } from './errors.js';

export interface SessionRoutesOptions {
  /** Largest chunk body accepted */
  maxChunkBytes?: number;
}

export function createSessionRoutes(
  registry: SessionRegistry,
  options: SessionRoutesOptions = {}
): Router {
  const router = Router();
  const rawChunk = express.raw({
    type: () => true,
    limit: options.maxChunkBytes ?? 256 * 1024 * 1024,
  });

  /**
   * POST /sessions
   * Open (or resume) an upload session
   */
  router.post('/', (req: Request, res: Response) => {
    const parsed = InitSessionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid session request',
        code: 'invalid_request',
        details: parsed.error.issues,
      });
      return;
    }

    try {
      const { session } = registry.createSession(parsed.data);
      res.status(201).json({ sessionId: session.sessionId });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * PUT /sessions/:sessionId/chunks/:index
   * Raw chunk bytes with offset and length headers
   */
  router.put('/:sessionId/chunks/:index', rawChunk, (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body)) {
        throw new RegistryError('Chunk body must be raw bytes', 400, 'invalid_request');
      }

      registry.storeChunk(
        req.params.sessionId,
        parseIntegerParam(req.params.index, 'chunk index'),
        parseIntegerParam(req.get(CHUNK_OFFSET_HEADER), CHUNK_OFFSET_HEADER),
        parseIntegerParam(req.get(CHUNK_LENGTH_HEADER), CHUNK_LENGTH_HEADER),
        body
      );
      res.json({ ack: true });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /sessions/:sessionId/finalize
   * Verify the assembled file and queue a transcription job
   */
  router.post('/:sessionId/finalize', async (req: Request, res: Response) => {
    const parsed = FinalizeSessionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'checksum is required',
        code: 'invalid_request',
        details: parsed.error.issues,
      });
      return;
    }

    try {
      const job = await registry.finalize(req.params.sessionId, parsed.data.checksum);
      res.json({ jobId: job.jobId });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * DELETE /sessions/:sessionId
   * Abandon a session
   */
  router.delete('/:sessionId', (req: Request, res: Response) => {
    if (!registry.getSession(req.params.sessionId)) {
      sendError(
        res,
        new RegistryError(`Session not found: ${req.params.sessionId}`, 404, 'session_not_found')
      );
      return;
    }
    registry.deleteSession(req.params.sessionId);
    res.json({ message: 'Session deleted' });
  });

  return router;
}

function parseIntegerParam(value: string | undefined, name: string): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new RegistryError(`${name} must be a non-negative integer`, 400, 'invalid_request');
  }
  return Number(value);
}
