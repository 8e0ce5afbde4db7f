/**
 * Server-side transcription job types
 */

export type JobStatus = 'queued' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ['succeeded', 'failed', 'cancelled'];

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

/**
 * Reference to the finished transcript. The server may add fields.
 */
export interface TranscriptReference {
  transcriptUrl?: string;
  text?: string;
  language?: string;
  [key: string]: unknown;
}

export interface TranscriptionJob {
  jobId: string;
  status: JobStatus;
  result?: TranscriptReference;
  error?: string;
  /** Progress percentage, when the server reports one */
  progress?: number;
}
