/**
 * Polls a transcription job until it reaches a terminal state
 */

import type { JobStatusResponse } from '../types/api.js';
import { isTerminalStatus, type TranscriptionJob } from '../types/job.js';
import {
  isRetryableError,
  JobCancelledError,
  PollTimeoutError,
  RemoteJobFailureError,
  TransportError,
  messageOf,
} from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { sleep, throwIfAborted } from '../utils/retry.js';
import type { Transport } from './transport.js';

export interface WaitOptions {
  /** Delay between polls while the server answers (ms) */
  pollInterval: number;
  /** Give up after this long without a terminal status (ms) */
  maxWait: number;
  /** Cap for the backed-off delay after failed polls (ms) */
  maxPollInterval?: number;
  signal?: AbortSignal;
  onStatus?: (job: TranscriptionJob) => void;
}

export class JobTracker {
  private logger = getLogger();

  constructor(private readonly transport: Transport) {}

  /**
   * Resolves with the job once it succeeds. Rejects with
   * RemoteJobFailureError, JobCancelledError (server-side cancel),
   * PollTimeoutError, CancelledError (caller abort) or a permanent
   * TransportError.
   */
  async waitForCompletion(jobId: string, options: WaitOptions): Promise<TranscriptionJob> {
    const { pollInterval, maxWait, signal } = options;
    const maxPollInterval = Math.max(options.maxPollInterval ?? pollInterval, pollInterval);
    const startedAt = Date.now();

    let delay = pollInterval;
    let lastStatus: string | undefined;

    for (;;) {
      throwIfAborted(signal);

      try {
        // A slow poll may not run past the deadline; the one at the deadline gets a full interval
        const budget = Math.max(maxWait - (Date.now() - startedAt), pollInterval);
        const response = await this.pollWithin(jobId, budget, startedAt, signal);
        const job = toJob(jobId, response);
        delay = pollInterval;

        if (job.status !== lastStatus) {
          this.logger.debug(`Job ${jobId}: ${job.status}`);
          lastStatus = job.status;
        }
        options.onStatus?.(job);

        if (isTerminalStatus(job.status)) {
          return settle(job);
        }
      } catch (error) {
        if (!(error instanceof TransportError) || !isRetryableError(error)) {
          throw error;
        }

        // Never shrinks while polls keep failing; the cap bounds it
        delay = Math.min(Math.max(delay * 2, error.retryAfterMs ?? 0), maxPollInterval);
        this.logger.warn(`Status poll for job ${jobId} failed, next poll in ${delay}ms`, {
          error: messageOf(error),
        });
      }

      const elapsed = Date.now() - startedAt;
      if (elapsed >= maxWait) {
        throw new PollTimeoutError(jobId, elapsed);
      }

      // The last poll lands exactly on the deadline
      await sleep(Math.min(delay, maxWait - elapsed), signal);
    }
  }

  /**
   * One status call, abandoned with PollTimeoutError once `budgetMs` runs out
   */
  private async pollWithin(
    jobId: string,
    budgetMs: number,
    startedAt: number,
    signal?: AbortSignal
  ): Promise<JobStatusResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, budgetMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      return await this.transport.pollStatus(jobId, { signal: controller.signal });
    } catch (error) {
      if (timedOut && !signal?.aborted) {
        throw new PollTimeoutError(jobId, Date.now() - startedAt);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

function toJob(jobId: string, response: JobStatusResponse): TranscriptionJob {
  return {
    jobId,
    status: response.status,
    result: response.result,
    error: response.error,
    progress: response.progress,
  };
}

function settle(job: TranscriptionJob): TranscriptionJob {
  switch (job.status) {
    case 'failed':
      throw new RemoteJobFailureError(job.jobId, job.error);
    case 'cancelled':
      throw new JobCancelledError(job.jobId);
    default:
      return job;
  }
}
