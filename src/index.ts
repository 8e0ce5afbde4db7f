/**
 * Chunked, resumable upload client for a remote transcription service
 */

// Main SDK class
export { Transcriber, type TranscriberDependencies } from './transcriber.js';

// Pipeline building blocks
export { ChunkStore, planChunks } from './lib/chunk-store.js';
export { BufferChunkSource, FileChunkSource, type ChunkSource } from './lib/chunk-source.js';
export { UploadSession, type UploadSessionOptions, type SessionRetryPolicy } from './lib/upload-session.js';
export { JobTracker, type WaitOptions } from './lib/job-tracker.js';
export { HttpTransport, type HttpTransportConfig } from './lib/transport-fetch.js';
export type { Transport, CallOptions } from './lib/transport.js';
export { createFileHandle, type Fetcher } from './lib/fetcher.js';
export { YtDlpFetcher, type YtDlpFetcherConfig } from './lib/ytdlp-fetcher.js';
export { MemorySessionStore, FileSessionStore, type SessionStore } from './lib/session-store.js';
export { checkServer, type HealthCheckResult } from './lib/health.js';
export { DEFAULT_CONFIG, resolveConfig, loadConfigFromEnv } from './lib/config.js';

// Type exports
export type * from './types/index.js';

// Error classes
export {
  TranscriberError,
  ValidationError,
  ChunkOutOfRangeError,
  FetchError,
  TransportError,
  CancelledError,
  ChunkFailureError,
  FinalizeFailureError,
  SessionFailureError,
  PollTimeoutError,
  RemoteJobFailureError,
  JobCancelledError,
  OrchestrationError,
  isRetryableError,
  describeError,
  type TransportErrorKind,
  type FetchErrorKind,
  type PipelineStage,
} from './utils/errors.js';

export { initLogger, getLogger, type Logger } from './utils/logger.js';
