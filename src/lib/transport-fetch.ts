/**
 * HTTP transport for the remote transcription service (fetch-based)
 */

import type { ZodType, ZodTypeDef } from 'zod';
import {
  ChunkAckResponseSchema,
  CHUNK_LENGTH_HEADER,
  CHUNK_OFFSET_HEADER,
  ErrorResponseSchema,
  FinalizeSessionResponseSchema,
  InitSessionResponseSchema,
  JobStatusResponseSchema,
  type ChunkAckResponse,
  type FinalizeSessionResponse,
  type InitSessionRequest,
  type InitSessionResponse,
  type JobStatusResponse,
} from '../types/api.js';
import type { ChunkDescriptor } from '../types/session.js';
import { CancelledError, TransportError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { CallOptions, Transport } from './transport.js';

export interface HttpTransportConfig {
  baseUrl: string;
  apiKey?: string;
  timeout?: number;
  debug?: boolean;
}

interface RequestSpec {
  method: 'GET' | 'POST' | 'PUT';
  path: string;
  json?: unknown;
  bytes?: Uint8Array;
  headers?: Record<string, string>;
}

const USER_AGENT = 'transcribe-uploader/1.0.0';

export class HttpTransport implements Transport {
  private baseUrl: string;
  private apiKey?: string;
  private timeout: number;
  private debug: boolean;
  private logger = getLogger();

  constructor(config: HttpTransportConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.timeout = config.timeout ?? 300000; // 5 minutes
    this.debug = config.debug ?? false;
  }

  async initSession(
    request: InitSessionRequest,
    options: CallOptions = {}
  ): Promise<InitSessionResponse> {
    return this.request(
      { method: 'POST', path: '/sessions', json: request },
      InitSessionResponseSchema,
      options
    );
  }

  async uploadChunk(
    sessionId: string,
    chunk: ChunkDescriptor,
    bytes: Uint8Array,
    options: CallOptions = {}
  ): Promise<ChunkAckResponse> {
    return this.request(
      {
        method: 'PUT',
        path: `/sessions/${encodeURIComponent(sessionId)}/chunks/${chunk.index}`,
        bytes,
        headers: {
          [CHUNK_OFFSET_HEADER]: String(chunk.offset),
          [CHUNK_LENGTH_HEADER]: String(chunk.length),
        },
      },
      ChunkAckResponseSchema,
      options
    );
  }

  async finalizeSession(
    sessionId: string,
    checksum: string,
    options: CallOptions = {}
  ): Promise<FinalizeSessionResponse> {
    return this.request(
      {
        method: 'POST',
        path: `/sessions/${encodeURIComponent(sessionId)}/finalize`,
        json: { checksum },
      },
      FinalizeSessionResponseSchema,
      options
    );
  }

  async pollStatus(jobId: string, options: CallOptions = {}): Promise<JobStatusResponse> {
    return this.request(
      { method: 'GET', path: `/jobs/${encodeURIComponent(jobId)}` },
      JobStatusResponseSchema,
      options
    );
  }

  /**
   * Make one HTTP request, bounded by the timeout, and classify the outcome
   */
  private async request<T>(
    req: RequestSpec,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: CallOptions
  ): Promise<T> {
    const url = `${this.baseUrl}${req.path}`;
    const callerSignal = options.signal;

    if (callerSignal?.aborted) {
      throw new CancelledError();
    }

    if (this.debug) {
      this.logger.debug(`HTTP Request: ${req.method} ${url}`, req.json);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    const onCallerAbort = () => controller.abort();
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method: req.method,
        headers: this.buildHeaders(req),
        body: req.bytes ?? (req.json !== undefined ? JSON.stringify(req.json) : undefined),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      if (timedOut) {
        throw new TransportError(`Request timeout after ${this.timeout}ms`, 'transient', {
          cause: error,
        });
      }
      if (callerSignal?.aborted) {
        throw new CancelledError();
      }
      throw new TransportError(`Network request failed: ${describeCause(error)}`, 'transient', {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }

    if (this.debug) {
      this.logger.debug(`HTTP Response: ${response.status}`, text);
    }

    if (!response.ok) {
      throw classifyHttpFailure(response, text);
    }

    const body = parseJson(text);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(
        `Malformed response from ${req.method} ${req.path}: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
          .join('; ')}`,
        'permanent',
        { statusCode: response.status }
      );
    }
    return parsed.data;
  }

  private buildHeaders(req: RequestSpec): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
      ...req.headers,
    };
    if (req.bytes) {
      headers['Content-Type'] = 'application/octet-stream';
    } else if (req.json !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}

/**
 * Map a non-2xx response to a TransportError:
 * 429 rate_limited, 5xx transient, any other status permanent.
 */
export function classifyHttpFailure(response: Response, text: string): TransportError {
  const status = response.status;
  const errorBody = ErrorResponseSchema.safeParse(parseJson(text));
  const serverMessage = errorBody.success ? errorBody.data.error : response.statusText;
  const code = errorBody.success ? errorBody.data.code : undefined;
  const message = `Request failed with status ${status}: ${serverMessage || 'no detail'}`;

  if (status === 429) {
    return new TransportError(message, 'rate_limited', {
      statusCode: status,
      code,
      retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
    });
  }
  if (status >= 500) {
    return new TransportError(message, 'transient', { statusCode: status, code });
  }
  return new TransportError(message, 'permanent', { statusCode: status, code });
}

/**
 * Retry-After is either delta-seconds or an HTTP date
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null || value.trim() === '') return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

function parseJson(text: string): unknown {
  if (text.trim() === '') return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function describeCause(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}
