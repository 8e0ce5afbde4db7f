/**
 * Client Configuration Types
 */

import type { FileHandle } from './session.js';
import type { TranscriptionJob } from './job.js';

export type AudioQuality = 'best' | 'good' | 'fast';

/**
 * Configuration for the Transcriber client
 */
export interface TranscriberConfig {
  /**
   * Base URL of the remote transcription service
   * @example 'http://localhost:8000'
   */
  serverUrl: string;

  /**
   * Bearer token sent with every request
   */
  apiKey?: string;

  /**
   * Chunk size in bytes
   * @default 8 MiB
   */
  chunkSize: number;

  /**
   * Number of chunks uploaded in parallel
   * @default 3
   */
  concurrency: number;

  /**
   * Retries per chunk, per session init and per finalize call
   * @default 3
   */
  maxRetries: number;

  /**
   * Per-call timeout in milliseconds
   * @default 300000
   */
  timeout: number;

  /**
   * Base delay for exponential backoff (ms)
   * @default 1000
   */
  retryInitialDelay: number;

  /**
   * Backoff cap (ms)
   * @default 30000
   */
  retryMaxDelay: number;

  /**
   * Randomise backoff delays
   * @default true
   */
  retryJitter: boolean;

  /**
   * Interval between job status polls (ms)
   * @default 5000
   */
  pollInterval: number;

  /**
   * Cap for the poll interval while the server keeps failing (ms)
   * @default 60000
   */
  maxPollInterval: number;

  /**
   * How long to wait for a terminal job status before giving up (ms)
   * @default 600000
   */
  pollTimeout: number;

  /**
   * Where downloaded media lands
   * @default './downloads'
   */
  downloadDir: string;

  /**
   * Where resumable session records are kept
   */
  stateDir: string;

  /**
   * Audio quality requested from the source
   * @default 'best'
   */
  audioQuality: AudioQuality;

  /**
   * Keep downloaded media after the run
   * @default false
   */
  keepLocalFiles: boolean;

  /**
   * Largest file accepted for upload, in bytes
   * @default 500 MiB
   */
  maxFileSize: number;

  /**
   * yt-dlp executable
   * @default 'yt-dlp'
   */
  ytdlpCmd: string;

  debug: boolean;
}

/**
 * Options for a single pipeline run
 */
export interface RunOptions {
  /**
   * Aborts the run: stops new chunk uploads and the polling loop
   */
  signal?: AbortSignal;

  /**
   * Progress callback for the whole pipeline
   */
  onProgress?: (progress: RunProgress) => void;

  /**
   * Wait for the job to reach a terminal state
   * @default true
   */
  wait?: boolean;

  /**
   * Write the terminal job record to this directory as JSON
   */
  outputDir?: string;
}

export type RunPhase =
  | 'fetching'
  | 'uploading'
  | 'finalizing'
  | 'polling'
  | 'complete';

/**
 * Progress information during a run
 */
export interface RunProgress {
  phase: RunPhase;

  bytesTotal: number;

  bytesUploaded: number;

  chunksTotal: number;

  chunksAcked: number;

  /**
   * Server-side job status while polling
   */
  jobStatus?: string;

  /**
   * Percentage of the upload complete (0-100)
   */
  percentComplete: number;
}

/**
 * Result of a run
 */
export interface TranscriptionResult {
  /**
   * Job as last reported by the server
   */
  job: TranscriptionJob;

  sessionId: string;

  file: FileHandle;

  /**
   * Path of the written job record, when outputDir was given
   */
  outputPath?: string;

  durationMs: number;
}
