/**
 * Upload session and chunk tracking types
 */

export interface FileHandle {
  /** Absolute path on local filesystem */
  path: string;
  /** File name only */
  fileName: string;
  /** File size in bytes */
  size: number;
  /** SHA-256 of the content, lower-case hex */
  checksum: string;
  /** MIME type, when known */
  contentType?: string;
  /** Title reported by the source */
  title?: string;
  durationSeconds?: number;
}

export interface ChunkDescriptor {
  index: number;
  offset: number;
  length: number;
}

export interface ChunkPlan {
  fileSize: number;
  chunkSize: number;
  chunks: readonly ChunkDescriptor[];
}

export type ChunkStatus = 'pending' | 'in_flight' | 'acked' | 'failed';

export interface ChunkState {
  status: ChunkStatus;
  /** Upload attempts made so far */
  attempts: number;
  lastError?: string;
}

export type SessionStatus =
  | 'building'      // Waiting for a session id from the server
  | 'in_progress'   // Chunks being uploaded
  | 'finalizing'    // Every chunk acked, finalize call issued
  | 'completed'     // Server returned a job id
  | 'failed';       // Terminal error

/**
 * Durable resume record, keyed by file checksum
 */
export interface SessionRecord {
  sessionId: string;
  checksum: string;
  fileSize: number;
  chunkSize: number;
  acked: number[];
  updatedAt: string;
}

export interface UploadProgress {
  bytesTotal: number;
  bytesUploaded: number;
  chunksTotal: number;
  chunksAcked: number;
}

export interface UploadOutcome {
  sessionId: string;
  jobId: string;
  /** Whether a prior session was resumed */
  resumed: boolean;
  /** Chunk uploads actually sent during this run, retries included */
  chunkAttempts: number;
}
