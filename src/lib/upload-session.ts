/**
 * Upload session state machine
 *
 *   building -> in_progress -> finalizing -> completed
 *        \            \              \
 *         `------------`--------------`--> failed
 */

import { CHECKSUM_MISMATCH_CODE, type InitSessionRequest } from '../types/api.js';
import type {
  FileHandle,
  SessionRecord,
  SessionStatus,
  UploadOutcome,
  UploadProgress,
} from '../types/session.js';
import {
  CancelledError,
  ChunkFailureError,
  FinalizeFailureError,
  SessionFailureError,
  TransportError,
  messageOf,
} from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { retryWithBackoff, throwIfAborted } from '../utils/retry.js';
import { ChunkStore, planChunks } from './chunk-store.js';
import { FileChunkSource, type ChunkSource } from './chunk-source.js';
import type { SessionStore } from './session-store.js';
import type { Transport } from './transport.js';

export interface SessionRetryPolicy {
  maxRetries: number;
  initialDelay: number;
  maxDelay: number;
  jitter: boolean;
}

export interface UploadSessionOptions {
  transport: Transport;
  file: FileHandle;
  chunkSize: number;
  /** Chunks uploaded in parallel */
  concurrency: number;
  retry: SessionRetryPolicy;
  /** Defaults to reading ranges of `file.path` */
  source?: ChunkSource;
  /** Enables resume across restarts */
  store?: SessionStore;
  signal?: AbortSignal;
  onProgress?: (progress: UploadProgress) => void;
  onStatusChange?: (status: SessionStatus) => void;
}

const TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  building: ['in_progress', 'failed'],
  in_progress: ['finalizing', 'failed'],
  finalizing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export class UploadSession {
  private currentStatus: SessionStatus = 'building';
  private started = false;
  private chunks: ChunkStore;
  private source: ChunkSource;
  private sessionId?: string;
  private failure?: unknown;
  private chunkAttempts = 0;
  private persistQueue: Promise<void> = Promise.resolve();
  private logger = getLogger();

  constructor(private readonly options: UploadSessionOptions) {
    this.chunks = new ChunkStore(planChunks(options.file, options.chunkSize));
    this.source = options.source ?? new FileChunkSource(options.file.path);
  }

  get status(): SessionStatus {
    return this.currentStatus;
  }

  get id(): string | undefined {
    return this.sessionId;
  }

  get chunkStore(): ChunkStore {
    return this.chunks;
  }

  /**
   * Drive the file to an acknowledged, finalized upload.
   * Resolves with the server's job id; rejects with SessionFailureError.
   */
  async driveToCompletion(): Promise<UploadOutcome> {
    if (this.started) {
      throw new Error('UploadSession.driveToCompletion() can only run once');
    }
    this.started = true;

    try {
      const resumed = await this.establishSession();
      this.transition('in_progress');

      await this.uploadChunks();
      this.transition('finalizing');

      const jobId = await this.finalize();
      this.transition('completed');
      await this.clearRecord();

      return {
        sessionId: this.requireSessionId(),
        jobId,
        resumed,
        chunkAttempts: this.chunkAttempts,
      };
    } catch (error) {
      this.transition('failed');
      await this.persistQueue;
      throw this.toSessionFailure(error);
    }
  }

  /**
   * building: obtain a session id, resuming a recorded session when the
   * server accepts its id
   */
  private async establishSession(): Promise<boolean> {
    const { file, store } = this.options;
    const request: InitSessionRequest = {
      fileName: file.fileName,
      fileSize: file.size,
      checksum: file.checksum,
      chunkSize: this.chunks.plan.chunkSize,
      chunkCount: this.chunks.size,
      contentType: file.contentType,
    };

    const record = store ? await store.load(file.checksum) : undefined;
    if (record && this.matchesPlan(record)) {
      const resumed = await this.tryResume(request, record);
      if (resumed !== undefined) {
        return resumed;
      }
    }

    const { sessionId } = await this.withRetry('initSession', this.options.signal, () =>
      this.options.transport.initSession(request, { signal: this.options.signal })
    );
    this.sessionId = sessionId;
    this.logger.info(`Upload session started: ${sessionId}`, {
      chunks: this.chunks.size,
      chunkSize: this.chunks.plan.chunkSize,
    });
    await this.persist();
    return false;
  }

  /**
   * Returns true when resumed, false when the server handed out a fresh
   * session instead, undefined when the resume attempt was rejected
   */
  private async tryResume(
    request: InitSessionRequest,
    record: SessionRecord
  ): Promise<boolean | undefined> {
    let sessionId: string;
    try {
      ({ sessionId } = await this.withRetry('initSession (resume)', this.options.signal, () =>
        this.options.transport.initSession(
          { ...request, resumeSessionId: record.sessionId },
          { signal: this.options.signal }
        )
      ));
    } catch (error) {
      if (error instanceof TransportError && error.kind === 'permanent') {
        this.logger.warn(`Server rejected resume of session ${record.sessionId}; starting fresh`, {
          error: error.message,
        });
        await this.options.store?.delete(record.checksum);
        return undefined;
      }
      throw error;
    }

    this.sessionId = sessionId;

    if (sessionId !== record.sessionId) {
      this.logger.info(`Server opened new session ${sessionId} instead of resuming ${record.sessionId}`);
      await this.persist();
      return false;
    }

    const acked = record.acked.filter((index) => index >= 0 && index < this.chunks.size);
    this.chunks.restoreAcked(acked);
    this.logger.info(`Resumed session ${sessionId}`, {
      acked: acked.length,
      remaining: this.chunks.size - acked.length,
    });
    this.reportProgress();
    return true;
  }

  private matchesPlan(record: SessionRecord): boolean {
    return (
      record.checksum === this.options.file.checksum &&
      record.fileSize === this.options.file.size &&
      record.chunkSize === this.chunks.plan.chunkSize
    );
  }

  /**
   * in_progress: run the worker pool until every chunk is acked, or a chunk
   * fails, or the caller aborts
   */
  private async uploadChunks(): Promise<void> {
    const pending = this.chunks.pendingIndices().length;
    const workerCount = Math.min(this.options.concurrency, pending);

    this.logger.debug(`Uploading ${pending} chunk(s) with ${workerCount} worker(s)`);

    // Aborted on the first chunk failure so sibling workers stop retrying
    const pool = new AbortController();
    const signal = this.options.signal
      ? AbortSignal.any([this.options.signal, pool.signal])
      : pool.signal;

    const workers: Promise<void>[] = [];
    for (let i = 0; i < workerCount; i++) {
      workers.push(this.runWorker(pool, signal));
    }

    // Every worker has exited here, so nothing can be issued after this point
    await Promise.all(workers);

    if (this.failure !== undefined) {
      throw this.failure;
    }
    throwIfAborted(this.options.signal);

    if (!this.chunks.isComplete()) {
      throw new Error(
        `Upload pool drained with chunks outstanding: ${this.chunks.pendingIndices().join(', ')}`
      );
    }
  }

  private async runWorker(pool: AbortController, signal: AbortSignal): Promise<void> {
    while (this.failure === undefined && !signal.aborted) {
      const index = this.chunks.claimNext();
      if (index === undefined) {
        return;
      }

      try {
        await this.uploadChunk(index, signal);
      } catch (error) {
        this.chunks.release(index);
        // Only the first failure counts; later ones are the pool abort echoing back
        if (this.failure === undefined) {
          this.failure = error;
          pool.abort();
        }
        return;
      }
    }
  }

  private async uploadChunk(index: number, signal: AbortSignal): Promise<void> {
    const chunk = this.chunks.descriptor(index);
    const sessionId = this.requireSessionId();

    try {
      const bytes = await this.source.read(chunk);

      await this.withRetry(`Chunk ${index}`, signal, async (attempt) => {
        if (attempt > 0) {
          this.chunks.markInFlight(index);
        }
        this.chunkAttempts++;

        try {
          await this.options.transport.uploadChunk(sessionId, chunk, bytes, { signal });
        } catch (error) {
          this.chunks.markFailed(index, messageOf(error));
          throw error;
        }
      });
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      this.chunks.markFailed(index, messageOf(error));
      throw new ChunkFailureError(index, this.chunks.stateOf(index).attempts, error);
    }

    this.chunks.markAcked(index);
    this.logger.debug(`Chunk ${index} acked`, { attempts: this.chunks.stateOf(index).attempts });
    this.reportProgress();
    await this.persist();
  }

  /**
   * finalizing: one call with the whole-file checksum; only finalize itself
   * is retried
   */
  private async finalize(): Promise<string> {
    const sessionId = this.requireSessionId();

    try {
      const { jobId } = await this.withRetry('finalize', this.options.signal, () =>
        this.options.transport.finalizeSession(sessionId, this.options.file.checksum, {
          signal: this.options.signal,
        })
      );
      this.logger.info(`Session ${sessionId} finalized, job ${jobId}`);
      return jobId;
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }

      const checksumMismatch =
        error instanceof TransportError && error.code === CHECKSUM_MISMATCH_CODE;
      if (checksumMismatch) {
        // The record describes content that no longer exists
        await this.clearRecord();
        throw new FinalizeFailureError(
          'Checksum mismatch at finalize: the local file changed during transfer; restart with a fresh read',
          true,
          error
        );
      }
      throw new FinalizeFailureError(`Finalize failed: ${messageOf(error)}`, false, error);
    }
  }

  private withRetry<T>(
    label: string,
    signal: AbortSignal | undefined,
    fn: (attempt: number) => Promise<T>
  ): Promise<T> {
    const { retry } = this.options;
    return retryWithBackoff(fn, {
      maxRetries: retry.maxRetries,
      initialDelay: retry.initialDelay,
      maxDelay: retry.maxDelay,
      jitter: retry.jitter,
      signal,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(
          `${label} failed, retrying (${attempt}/${retry.maxRetries}) in ${delayMs}ms`,
          { error: messageOf(error) }
        );
      },
    });
  }

  private transition(next: SessionStatus): void {
    const from = this.currentStatus;
    if (from === next) return;
    if (!TRANSITIONS[from].includes(next)) {
      throw new Error(`Invalid session transition ${from} -> ${next}`);
    }
    this.currentStatus = next;
    this.logger.debug(`Session ${this.sessionId ?? '(pending)'}: ${from} -> ${next}`);
    this.options.onStatusChange?.(next);
  }

  private toSessionFailure(error: unknown): SessionFailureError {
    const sessionId = this.sessionId;

    if (error instanceof ChunkFailureError) {
      return new SessionFailureError(`Upload failed at chunk ${error.chunkIndex}`, {
        sessionId,
        chunkIndex: error.chunkIndex,
        cause: error,
      });
    }
    if (error instanceof FinalizeFailureError) {
      return new SessionFailureError(error.message, { sessionId, cause: error });
    }
    if (error instanceof CancelledError) {
      return new SessionFailureError('Upload cancelled', { sessionId, cause: error });
    }
    if (this.sessionId === undefined) {
      return new SessionFailureError(`Could not start upload session: ${messageOf(error)}`, {
        cause: error,
      });
    }
    return new SessionFailureError(`Upload failed: ${messageOf(error)}`, {
      sessionId,
      cause: error,
    });
  }

  private reportProgress(): void {
    this.options.onProgress?.({
      bytesTotal: this.chunks.plan.fileSize,
      bytesUploaded: this.chunks.ackedBytes(),
      chunksTotal: this.chunks.size,
      chunksAcked: this.chunks.ackedIndices().length,
    });
  }

  /**
   * Queue a snapshot of the acked set; writes are serialised so the last
   * one always carries the newest state
   */
  private persist(): Promise<void> {
    const { store, file } = this.options;
    if (!store || this.sessionId === undefined) {
      return this.persistQueue;
    }

    const record: SessionRecord = {
      sessionId: this.sessionId,
      checksum: file.checksum,
      fileSize: file.size,
      chunkSize: this.chunks.plan.chunkSize,
      acked: this.chunks.ackedIndices(),
      updatedAt: new Date().toISOString(),
    };

    this.persistQueue = this.persistQueue
      .then(() => store.save(file.checksum, record))
      .catch((error: unknown) => {
        this.logger.warn('Could not save resume record', { error: messageOf(error) });
      });
    return this.persistQueue;
  }

  private async clearRecord(): Promise<void> {
    const { store, file } = this.options;
    if (!store) return;

    await this.persistQueue;
    try {
      await store.delete(file.checksum);
    } catch (error) {
      this.logger.warn('Could not remove resume record', { error: messageOf(error) });
    }
  }

  private requireSessionId(): string {
    if (this.sessionId === undefined) {
      throw new Error('No session id yet');
    }
    return this.sessionId;
  }
}
