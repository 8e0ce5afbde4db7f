import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import express from 'express';
import { createApp } from '../server/app.js';
import { SessionRegistry } from '../server/services/session-registry.js';
import { HttpTransport, classifyHttpFailure, parseRetryAfter } from '../lib/transport-fetch.js';
import { CancelledError, TransportError } from '../utils/errors.js';
import { computeChecksum } from '../utils/hash.js';
import { listen, type RunningServer } from './helpers/server.js';

async function captureTransportError(call: Promise<unknown>): Promise<TransportError> {
  try {
    await call;
  } catch (error) {
    if (error instanceof TransportError) return error;
    throw error;
  }
  throw new Error('Expected a TransportError');
}

describe('HttpTransport against the dev server', () => {
  let server: RunningServer;
  let transport: HttpTransport;
  const data = new Uint8Array(Buffer.from('hello world'));

  beforeAll(async () => {
    server = await listen(createApp(new SessionRegistry({ pollsUntilDone: 2 })));
    transport = new HttpTransport({ baseUrl: server.url, timeout: 5000 });
  });

  afterAll(async () => {
    await server.close();
  });

  it('runs a session from init to a finished job', async () => {
    const checksum = await computeChecksum(data);
    const { sessionId } = await transport.initSession({
      fileName: 'greeting.mp3',
      fileSize: 11,
      checksum,
      chunkSize: 6,
      chunkCount: 2,
    });

    await expect(
      transport.uploadChunk(sessionId, { index: 0, offset: 0, length: 6 }, data.subarray(0, 6))
    ).resolves.toEqual({ ack: true });
    await transport.uploadChunk(sessionId, { index: 1, offset: 6, length: 5 }, data.subarray(6));

    const { jobId } = await transport.finalizeSession(sessionId, checksum);

    await expect(transport.pollStatus(jobId)).resolves.toEqual({ status: 'running' });
    const done = await transport.pollStatus(jobId);
    expect(done.status).toBe('succeeded');
    expect(done.result?.transcriptUrl).toBe(`/jobs/${jobId}/transcript`);
  });

  it('reports a checksum mismatch as a permanent error with its code', async () => {
    const declared = await computeChecksum(new Uint8Array(Buffer.from('other bytes')));
    const { sessionId } = await transport.initSession({
      fileName: 'greeting.mp3',
      fileSize: 11,
      checksum: declared,
      chunkSize: 11,
      chunkCount: 1,
    });
    await transport.uploadChunk(sessionId, { index: 0, offset: 0, length: 11 }, data);

    const error = await captureTransportError(transport.finalizeSession(sessionId, declared));

    expect(error.kind).toBe('permanent');
    expect(error.statusCode).toBe(422);
    expect(error.code).toBe('checksum_mismatch');
  });

  it('rejects a chunk whose headers disagree with the plan', async () => {
    const checksum = await computeChecksum(data);
    const { sessionId } = await transport.initSession({
      fileName: 'greeting.mp3',
      fileSize: 11,
      checksum,
      chunkSize: 6,
      chunkCount: 2,
    });

    const error = await captureTransportError(
      transport.uploadChunk(sessionId, { index: 1, offset: 5, length: 5 }, data.subarray(6))
    );

    expect(error.kind).toBe('permanent');
    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('invalid_chunk_range');
  });

  it('treats an unknown job as permanent', async () => {
    const error = await captureTransportError(transport.pollStatus('missing'));

    expect(error.kind).toBe('permanent');
    expect(error.statusCode).toBe(404);
    expect(error.code).toBe('job_not_found');
    expect(error.message).toBe('Request failed with status 404: Job not found: missing');
  });
});

describe('HttpTransport failure handling', () => {
  let server: RunningServer;
  let lastAuthorization: string | undefined;

  beforeAll(async () => {
    const app = express();
    app.use(express.json());
    app.post('/sessions', (req, res) => {
      lastAuthorization = req.get('authorization');
      res.json({ sessionId: 42 });
    });
    app.get('/jobs/limited', (req, res) => {
      res.status(429).set('Retry-After', '2').json({ error: 'slow down' });
    });
    app.get('/jobs/down', (req, res) => {
      res.status(503).send('upstream down');
    });
    app.get('/jobs/slow', (req, res) => {
      setTimeout(() => res.json({ status: 'running' }), 300);
    });
    server = await listen(app);
  });

  afterAll(async () => {
    await server.close();
  });

  const request = {
    fileName: 'a.mp3',
    fileSize: 1,
    checksum: 'abc',
    chunkSize: 1,
    chunkCount: 1,
  };

  it('sends the API key and rejects a malformed body as permanent', async () => {
    const transport = new HttpTransport({ baseUrl: server.url, apiKey: 'test-secret' });

    const error = await captureTransportError(transport.initSession(request));

    expect(lastAuthorization).toBe('Bearer test-secret');
    expect(error.kind).toBe('permanent');
    expect(error.message).toBe(
      'Malformed response from POST /sessions: sessionId Expected string, received number'
    );
  });

  it('classifies 429 as rate limited with the Retry-After delay', async () => {
    const transport = new HttpTransport({ baseUrl: server.url });

    const error = await captureTransportError(transport.pollStatus('limited'));

    expect(error.kind).toBe('rate_limited');
    expect(error.retryAfterMs).toBe(2000);
    expect(error.message).toBe('Request failed with status 429: slow down');
  });

  it('classifies 5xx as transient', async () => {
    const transport = new HttpTransport({ baseUrl: server.url });

    const error = await captureTransportError(transport.pollStatus('down'));

    expect(error.kind).toBe('transient');
    expect(error.message).toBe('Request failed with status 503: Service Unavailable');
  });

  it('turns a timeout into a transient error', async () => {
    const transport = new HttpTransport({ baseUrl: server.url, timeout: 50 });

    const error = await captureTransportError(transport.pollStatus('slow'));

    expect(error.kind).toBe('transient');
    expect(error.message).toBe('Request timeout after 50ms');
  });

  it('turns a caller abort into CancelledError', async () => {
    const transport = new HttpTransport({ baseUrl: server.url, timeout: 5000 });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    await expect(transport.pollStatus('slow', { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
  });
});

describe('classifyHttpFailure', () => {
  it('falls back to the status text when the body is not an error object', () => {
    const error = classifyHttpFailure(new Response('oops', { status: 400, statusText: 'Bad Request' }), 'oops');

    expect(error.kind).toBe('permanent');
    expect(error.message).toBe('Request failed with status 400: Bad Request');
  });
});

describe('parseRetryAfter', () => {
  it('reads delta seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:10 GMT', now)).toBe(10000);
  });

  it('ignores missing or unreadable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
