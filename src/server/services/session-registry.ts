/**
 * In-memory sessions and jobs for the development server
 */

import { ulid } from 'ulid';
import { CHECKSUM_MISMATCH_CODE } from '../../types/api.js';
import type { JobStatus } from '../../types/job.js';
import type {
  ParsedInitSessionRequest,
  ServerJob,
  ServerSession,
} from '../../types/server.js';
import { computeChecksum } from '../../utils/hash.js';
import { getLogger } from '../../utils/logger.js';

const logger = getLogger();

/**
 * Error with the HTTP status and error code the routes answer with
 */
export class RegistryError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code?: string
  ) {
    super(message);
    this.name = 'RegistryError';
  }
}

export interface SessionRegistryOptions {
  /** Polls a job answers before reaching its terminal status */
  pollsUntilDone?: number;
  /** Terminal status jobs end in */
  jobOutcome?: Extract<JobStatus, 'succeeded' | 'failed'>;
  sessionTtl?: number; // ms
}

export interface CreateSessionResult {
  session: ServerSession;
  resumed: boolean;
}

export class SessionRegistry {
  private sessions = new Map<string, ServerSession>();
  private jobs = new Map<string, ServerJob>();
  private cleanupTimers = new Map<string, NodeJS.Timeout>();
  private readonly pollsUntilDone: number;
  private readonly jobOutcome: Extract<JobStatus, 'succeeded' | 'failed'>;
  private readonly sessionTtl: number;

  constructor(options: SessionRegistryOptions = {}) {
    this.pollsUntilDone = Math.max(1, options.pollsUntilDone ?? 2);
    this.jobOutcome = options.jobOutcome ?? 'succeeded';
    this.sessionTtl = options.sessionTtl ?? 24 * 60 * 60 * 1000; // 24 hours
  }

  /**
   * Create a session, or hand back the prior one when it describes the same file
   */
  createSession(request: ParsedInitSessionRequest): CreateSessionResult {
    const expected = Math.ceil(request.fileSize / request.chunkSize);
    if (request.chunkCount !== expected) {
      throw new RegistryError(
        `chunkCount ${request.chunkCount} does not match ${expected} chunks of ${request.chunkSize} bytes`,
        400,
        'invalid_chunk_count'
      );
    }

    if (request.resumeSessionId) {
      const prior = this.sessions.get(request.resumeSessionId);
      if (
        prior &&
        !prior.jobId &&
        prior.checksum === request.checksum &&
        prior.fileSize === request.fileSize &&
        prior.chunkSize === request.chunkSize
      ) {
        prior.updatedAt = new Date();
        logger.info(`Resumed session: ${prior.sessionId}`, { held: prior.chunks.size });
        return { session: prior, resumed: true };
      }
      logger.debug(`Cannot resume ${request.resumeSessionId}; starting a new session`);
    }

    const now = new Date();
    const session: ServerSession = {
      sessionId: ulid(),
      fileName: request.fileName,
      fileSize: request.fileSize,
      checksum: request.checksum,
      chunkSize: request.chunkSize,
      chunkCount: request.chunkCount,
      contentType: request.contentType,
      chunks: new Map(),
      createdAt: now,
      updatedAt: now,
      expiresAt: new Date(now.getTime() + this.sessionTtl),
    };

    this.sessions.set(session.sessionId, session);
    this.scheduleCleanup(session.sessionId);
    logger.info(`Created session: ${session.sessionId}`, {
      fileName: session.fileName,
      fileSize: session.fileSize,
      chunkCount: session.chunkCount,
    });

    return { session, resumed: false };
  }

  getSession(sessionId: string): ServerSession | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Store one chunk after checking it against the session's plan.
   * Re-sending a chunk replaces it.
   */
  storeChunk(sessionId: string, index: number, offset: number, length: number, body: Buffer): void {
    const session = this.requireSession(sessionId);
    if (session.jobId) {
      throw new RegistryError(`Session ${sessionId} is already finalized`, 409, 'session_finalized');
    }

    if (!Number.isInteger(index) || index < 0 || index >= session.chunkCount) {
      throw new RegistryError(
        `Chunk index ${index} out of range [0, ${session.chunkCount})`,
        400,
        'invalid_chunk_index'
      );
    }

    const expectedOffset = index * session.chunkSize;
    const expectedLength = Math.min(session.chunkSize, session.fileSize - expectedOffset);
    if (offset !== expectedOffset || length !== expectedLength || body.length !== expectedLength) {
      throw new RegistryError(
        `Chunk ${index} must cover offset ${expectedOffset} with ${expectedLength} bytes ` +
          `(got offset ${offset}, length ${length}, body ${body.length})`,
        400,
        'invalid_chunk_range'
      );
    }

    session.chunks.set(index, Buffer.from(body));
    session.updatedAt = new Date();
    logger.debug(`Session ${sessionId}: chunk ${index} stored`, {
      held: session.chunks.size,
      of: session.chunkCount,
    });
  }

  /**
   * Assemble the file, verify its checksum and queue a job.
   * Finalizing twice returns the same job.
   */
  async finalize(sessionId: string, checksum: string): Promise<ServerJob> {
    const session = this.requireSession(sessionId);
    if (session.jobId) {
      const existing = this.jobs.get(session.jobId);
      if (existing) return existing;
    }

    const missing: number[] = [];
    for (let i = 0; i < session.chunkCount; i++) {
      if (!session.chunks.has(i)) missing.push(i);
    }
    if (missing.length > 0) {
      throw new RegistryError(
        `Session ${sessionId} is missing chunks: ${missing.join(', ')}`,
        409,
        'missing_chunks'
      );
    }

    const assembled = Buffer.concat(
      Array.from({ length: session.chunkCount }, (_, i) => session.chunks.get(i) ?? Buffer.alloc(0))
    );
    const actual = await computeChecksum(assembled);
    if (actual !== checksum || actual !== session.checksum) {
      logger.warn(`Session ${sessionId}: checksum mismatch`, { expected: checksum, actual });
      throw new RegistryError('Assembled file does not match checksum', 422, CHECKSUM_MISMATCH_CODE);
    }

    const job: ServerJob = {
      jobId: ulid(),
      sessionId,
      status: 'queued',
      polls: 0,
      createdAt: new Date(),
    };
    this.jobs.set(job.jobId, job);
    session.jobId = job.jobId;
    session.chunks.clear();

    logger.info(`Session ${sessionId} finalized as job ${job.jobId}`);
    return job;
  }

  /**
   * Answer a status poll. Each poll moves the job along:
   * running until pollsUntilDone, then the configured outcome.
   */
  pollJob(jobId: string): ServerJob | undefined {
    const job = this.jobs.get(jobId);
    if (!job || job.status === 'succeeded' || job.status === 'failed' || job.status === 'cancelled') {
      return job;
    }

    job.polls++;
    if (job.polls < this.pollsUntilDone) {
      job.status = 'running';
      return job;
    }

    const session = this.sessions.get(job.sessionId);
    job.status = this.jobOutcome;
    if (job.status === 'succeeded') {
      job.result = {
        transcriptUrl: `/jobs/${job.jobId}/transcript`,
        fileName: session?.fileName,
        checksum: session?.checksum,
      };
    } else {
      job.error = 'Transcription failed';
    }
    logger.info(`Job ${jobId}: ${job.status}`);
    return job;
  }

  cancelJob(jobId: string): ServerJob | undefined {
    const job = this.jobs.get(jobId);
    if (job && (job.status === 'queued' || job.status === 'running')) {
      job.status = 'cancelled';
      logger.info(`Job ${jobId}: cancelled`);
    }
    return job;
  }

  deleteSession(sessionId: string): void {
    const timer = this.cleanupTimers.get(sessionId);
    if (timer) {
      clearTimeout(timer);
      this.cleanupTimers.delete(sessionId);
    }
    if (this.sessions.delete(sessionId)) {
      logger.debug(`Deleted session: ${sessionId}`);
    }
  }

  /**
   * Drop everything (on server shutdown)
   */
  cleanupAll(): void {
    logger.info(`Cleaning up all sessions (${this.sessions.size} total)`);
    for (const sessionId of Array.from(this.sessions.keys())) {
      this.deleteSession(sessionId);
    }
    this.jobs.clear();
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  getJobCount(): number {
    return this.jobs.size;
  }

  private requireSession(sessionId: string): ServerSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new RegistryError(`Session not found: ${sessionId}`, 404, 'session_not_found');
    }
    return session;
  }

  private scheduleCleanup(sessionId: string): void {
    const timer = setTimeout(() => {
      const session = this.sessions.get(sessionId);
      if (session && Date.now() >= session.expiresAt.getTime()) {
        logger.info(`Auto-cleaning expired session: ${sessionId}`);
        this.deleteSession(sessionId);
      }
    }, this.sessionTtl);
    timer.unref();

    this.cleanupTimers.set(sessionId, timer);
  }
}
