/**
 * Types for the development server
 */

import { z } from 'zod';
import type { JobStatus, TranscriptReference } from './job.js';

/**
 * POST /sessions body
 */
export const InitSessionRequestSchema = z.object({
  fileName: z.string().min(1),
  fileSize: z.number().int().positive(),
  checksum: z.string().regex(/^[0-9a-f]{64}$/, 'must be a lower-case SHA-256 hex digest'),
  chunkSize: z.number().int().positive(),
  chunkCount: z.number().int().positive(),
  contentType: z.string().optional(),
  resumeSessionId: z.string().optional(),
});

/**
 * POST /sessions/:sessionId/finalize body
 */
export const FinalizeSessionRequestSchema = z.object({
  checksum: z.string().min(1),
});

export type ParsedInitSessionRequest = z.infer<typeof InitSessionRequestSchema>;

/**
 * Upload session held in memory
 */
export interface ServerSession {
  sessionId: string;
  fileName: string;
  fileSize: number;
  checksum: string;
  chunkSize: number;
  chunkCount: number;
  contentType?: string;
  chunks: Map<number, Buffer>;
  /** Set once finalize has produced a job */
  jobId?: string;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
}

export interface ServerJob {
  jobId: string;
  sessionId: string;
  status: JobStatus;
  /** Status polls answered so far */
  polls: number;
  result?: TranscriptReference;
  error?: string;
  createdAt: Date;
}

export interface HealthCheckResponse {
  status: 'healthy';
  version: string;
  uptime: number; // seconds
  sessions: number;
  jobs: number;
}
