/**
 * Type Definitions Export
 */

// Client configuration types
export type {
  AudioQuality,
  TranscriberConfig,
  RunOptions,
  RunPhase,
  RunProgress,
  TranscriptionResult,
} from './config.js';

// Session types
export type {
  FileHandle,
  ChunkDescriptor,
  ChunkPlan,
  ChunkStatus,
  ChunkState,
  SessionStatus,
  SessionRecord,
  UploadProgress,
  UploadOutcome,
} from './session.js';

// Job types
export type { JobStatus, TranscriptReference, TranscriptionJob } from './job.js';

// Service API types
export type {
  InitSessionRequest,
  InitSessionResponse,
  ChunkAckResponse,
  FinalizeSessionRequest,
  FinalizeSessionResponse,
  JobStatusResponse,
  ErrorResponse,
} from './api.js';
