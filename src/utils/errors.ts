/**
 * Custom error classes for the transfer-and-tracking pipeline
 */

export type TransportErrorKind = 'transient' | 'permanent' | 'rate_limited';

export type FetchErrorKind =
  | 'unsupported_source'
  | 'network_error'
  | 'restricted_content';

export type PipelineStage = 'fetch' | 'upload' | 'track';

export class TranscriberError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends TranscriberError {
  constructor(
    message: string,
    public field?: string
  ) {
    super(message);
  }
}

export class ChunkOutOfRangeError extends TranscriberError {
  constructor(
    public index: number,
    public chunkCount: number
  ) {
    super(`Chunk index ${index} is outside the plan (0..${chunkCount - 1})`);
  }
}

export class FetchError extends TranscriberError {
  constructor(
    message: string,
    public kind: FetchErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class TransportError extends TranscriberError {
  public kind: TransportErrorKind;
  public statusCode?: number;
  public retryAfterMs?: number;
  /** Machine-readable code from the server's error body, if any */
  public code?: string;

  constructor(
    message: string,
    kind: TransportErrorKind,
    details: {
      statusCode?: number;
      retryAfterMs?: number;
      code?: string;
      cause?: unknown;
    } = {}
  ) {
    super(message, { cause: details.cause });
    this.kind = kind;
    this.statusCode = details.statusCode;
    this.retryAfterMs = details.retryAfterMs;
    this.code = details.code;
  }
}

/**
 * Raised when the caller aborts an operation through its AbortSignal.
 * Distinct from a job the server reports as cancelled.
 */
export class CancelledError extends TranscriberError {
  constructor(message = 'Operation cancelled by caller') {
    super(message);
  }
}

export class ChunkFailureError extends TranscriberError {
  constructor(
    public chunkIndex: number,
    public attempts: number,
    cause: unknown
  ) {
    super(
      `Chunk ${chunkIndex} failed after ${attempts} attempt(s): ${messageOf(cause)}`,
      { cause }
    );
  }
}

export class FinalizeFailureError extends TranscriberError {
  constructor(
    message: string,
    public checksumMismatch: boolean,
    cause?: unknown
  ) {
    super(message, { cause });
  }
}

export class SessionFailureError extends TranscriberError {
  public sessionId?: string;
  public chunkIndex?: number;

  constructor(
    message: string,
    details: { sessionId?: string; chunkIndex?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.sessionId = details.sessionId;
    this.chunkIndex = details.chunkIndex;
  }
}

export class PollTimeoutError extends TranscriberError {
  constructor(
    public jobId: string,
    public elapsedMs: number
  ) {
    super(
      `Job ${jobId} did not reach a terminal state within ${elapsedMs}ms (it may still complete on the server)`
    );
  }
}

export class RemoteJobFailureError extends TranscriberError {
  constructor(
    public jobId: string,
    public detail?: string
  ) {
    super(`Job ${jobId} failed on the server: ${detail ?? 'no detail provided'}`);
  }
}

export class JobCancelledError extends TranscriberError {
  constructor(public jobId: string) {
    super(`Job ${jobId} was cancelled on the server`);
  }
}

export class OrchestrationError extends TranscriberError {
  constructor(
    public stage: PipelineStage,
    cause: unknown
  ) {
    super(`${stage} stage failed: ${messageOf(cause)}`, { cause });
  }
}

/**
 * Determine if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  return (
    error instanceof TransportError &&
    (error.kind === 'transient' || error.kind === 'rate_limited')
  );
}

export function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Short, user-facing description: stage, underlying kind and chunk index.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof OrchestrationError)) {
    return messageOf(error);
  }

  const parts = [`stage=${error.stage}`];
  let cause: unknown = error.cause;

  while (cause instanceof Error) {
    if (cause instanceof SessionFailureError && cause.chunkIndex !== undefined) {
      parts.push(`chunk=${cause.chunkIndex}`);
    }
    if (cause instanceof TransportError || cause instanceof FetchError) {
      parts.push(`kind=${cause.kind}`);
      break;
    }
    if (!(cause.cause instanceof Error)) {
      parts.push(`kind=${cause.name}`);
      break;
    }
    cause = cause.cause;
  }

  return `${parts.join(' ')}: ${messageOf(error.cause)}`;
}
