import type { Response } from 'express';
import { getLogger } from '../../utils/logger.js';
import { messageOf } from '../../utils/errors.js';
import { RegistryError } from '../services/session-registry.js';

const logger = getLogger();

/**
 * Answer with { error, code? }; unknown failures become 500
 */
export function sendError(res: Response, error: unknown): void {
  if (error instanceof RegistryError) {
    res.status(error.statusCode).json({ error: error.message, code: error.code });
    return;
  }

  logger.error('Request failed', { error: messageOf(error) });
  res.status(500).json({ error: messageOf(error) });
}
