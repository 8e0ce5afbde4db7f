/**
 * Transport contract for the remote transcription service.
 *
 * Every call either resolves with a success value or rejects with a
 * TransportError (classified transient / permanent / rate_limited) or, when
 * the caller's signal aborts, a CancelledError.
 */

import type {
  ChunkAckResponse,
  FinalizeSessionResponse,
  InitSessionRequest,
  InitSessionResponse,
  JobStatusResponse,
} from '../types/api.js';
import type { ChunkDescriptor } from '../types/session.js';

export interface CallOptions {
  signal?: AbortSignal;
}

export interface Transport {
  initSession(request: InitSessionRequest, options?: CallOptions): Promise<InitSessionResponse>;

  uploadChunk(
    sessionId: string,
    chunk: ChunkDescriptor,
    bytes: Uint8Array,
    options?: CallOptions
  ): Promise<ChunkAckResponse>;

  finalizeSession(
    sessionId: string,
    checksum: string,
    options?: CallOptions
  ): Promise<FinalizeSessionResponse>;

  pollStatus(jobId: string, options?: CallOptions): Promise<JobStatusResponse>;
}
