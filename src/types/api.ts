/**
 * Request and response types for the remote transcription service.
 * Responses are validated at runtime; a body that fails its schema is a
 * malformed response.
 */

import { z } from 'zod';

export interface InitSessionRequest {
  fileName: string;
  fileSize: number;
  checksum: string;
  chunkSize: number;
  chunkCount: number;
  contentType?: string;
  /** Prior session id to resume, if any */
  resumeSessionId?: string;
}

export interface FinalizeSessionRequest {
  checksum: string;
}

export const InitSessionResponseSchema = z.object({
  sessionId: z.string().min(1),
});

export const ChunkAckResponseSchema = z.object({
  ack: z.literal(true),
});

export const FinalizeSessionResponseSchema = z.object({
  jobId: z.string().min(1),
});

export const JobStatusSchema = z.enum(['queued', 'running', 'succeeded', 'failed', 'cancelled']);

export const JobStatusResponseSchema = z.object({
  status: JobStatusSchema,
  result: z
    .object({
      transcriptUrl: z.string().optional(),
      text: z.string().optional(),
      language: z.string().optional(),
    })
    .passthrough()
    .optional(),
  error: z.string().optional(),
  progress: z.number().optional(),
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  code: z.string().optional(),
  details: z.unknown().optional(),
});

export type InitSessionResponse = z.infer<typeof InitSessionResponseSchema>;
export type ChunkAckResponse = z.infer<typeof ChunkAckResponseSchema>;
export type FinalizeSessionResponse = z.infer<typeof FinalizeSessionResponseSchema>;
export type JobStatusResponse = z.infer<typeof JobStatusResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

/** Error code the server uses when the assembled file does not match */
export const CHECKSUM_MISMATCH_CODE = 'checksum_mismatch';

export const CHUNK_OFFSET_HEADER = 'x-chunk-offset';
export const CHUNK_LENGTH_HEADER = 'x-chunk-length';
