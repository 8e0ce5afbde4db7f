import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Transcriber } from '../transcriber.js';
import { createFileHandle, type Fetcher } from '../lib/fetcher.js';
import { MemorySessionStore } from '../lib/session-store.js';
import { createApp } from '../server/app.js';
import { SessionRegistry } from '../server/services/session-registry.js';
import type { RunPhase, TranscriberConfig } from '../types/config.js';
import type { FileHandle } from '../types/session.js';
import {
  FetchError,
  OrchestrationError,
  RemoteJobFailureError,
  SessionFailureError,
  ValidationError,
} from '../utils/errors.js';
import { permanent, ScriptedTransport } from './helpers/fake-transport.js';
import { listen, type RunningServer } from './helpers/server.js';

const CONTENT = Buffer.from('0123456789abcdefghij');

class FakeFetcher implements Fetcher {
  calls: string[] = [];

  constructor(private readonly dir: string) {}

  async fetch(url: string): Promise<FileHandle> {
    this.calls.push(url);
    const filePath = path.join(this.dir, 'episode.mp3');
    await fs.writeFile(filePath, CONTENT);
    return createFileHandle(filePath, { title: 'Episode' });
  }
}

class FailingFetcher implements Fetcher {
  async fetch(): Promise<FileHandle> {
    throw new FetchError('Video unavailable', 'restricted_content');
  }
}

async function captureOrchestrationError(call: Promise<unknown>): Promise<OrchestrationError> {
  try {
    await call;
  } catch (error) {
    if (error instanceof OrchestrationError) return error;
    throw error;
  }
  throw new Error('Expected an OrchestrationError');
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

describe('Transcriber', () => {
  let server: RunningServer;
  let registry: SessionRegistry;
  let workDir: string;
  let fetcher: FakeFetcher;
  let config: Partial<TranscriberConfig>;

  beforeAll(async () => {
    registry = new SessionRegistry({ pollsUntilDone: 2 });
    server = await listen(createApp(registry));
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'transcriber-'));
    fetcher = new FakeFetcher(workDir);
    config = {
      serverUrl: server.url,
      chunkSize: 4,
      concurrency: 2,
      retryInitialDelay: 0,
      retryMaxDelay: 0,
      pollInterval: 10,
      maxPollInterval: 10,
      pollTimeout: 5000,
      stateDir: path.join(workDir, 'state'),
    };
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('downloads, uploads and waits for the transcript', async () => {
    const transcriber = new Transcriber(config, { fetcher, sessionStore: new MemorySessionStore() });
    const phases: RunPhase[] = [];
    const outputDir = path.join(workDir, 'out');

    const result = await transcriber.run('https://media.example.test/watch?v=1', {
      outputDir,
      onProgress: (progress) => {
        if (phases[phases.length - 1] !== progress.phase) phases.push(progress.phase);
      },
    });

    expect(fetcher.calls).toEqual(['https://media.example.test/watch?v=1']);
    expect(result.job.status).toBe('succeeded');
    expect(result.job.result?.transcriptUrl).toBe(`/jobs/${result.job.jobId}/transcript`);
    expect(result.file.size).toBe(20);
    expect(phases).toEqual(['fetching', 'uploading', 'finalizing', 'polling', 'complete']);

    expect(result.outputPath).toBe(path.join(outputDir, `transcription_${result.job.jobId}.json`));
    const saved: unknown = JSON.parse(await fs.readFile(path.join(outputDir, `transcription_${result.job.jobId}.json`), 'utf-8'));
    expect(saved).toMatchObject({ jobId: result.job.jobId, status: 'succeeded' });

    expect(await exists(result.file.path)).toBe(false);
  });

  it('keeps the download when asked to', async () => {
    const transcriber = new Transcriber(
      { ...config, keepLocalFiles: true },
      { fetcher, sessionStore: new MemorySessionStore() }
    );

    const result = await transcriber.run('https://media.example.test/watch?v=2');

    expect(await exists(result.file.path)).toBe(true);
  });

  it('returns the queued job without polling when not waiting', async () => {
    const transcriber = new Transcriber(config, { fetcher, sessionStore: new MemorySessionStore() });

    const result = await transcriber.run('https://media.example.test/watch?v=3', { wait: false });

    expect(result.job.status).toBe('queued');
    expect(result.outputPath).toBeUndefined();
  });

  it('uploads a local file and leaves it in place', async () => {
    const filePath = path.join(workDir, 'local.wav');
    await fs.writeFile(filePath, CONTENT);
    const transcriber = new Transcriber(config, { fetcher, sessionStore: new MemorySessionStore() });

    const result = await transcriber.transcribeFile(filePath);

    expect(result.job.status).toBe('succeeded');
    expect(result.file.contentType).toBe('audio/wav');
    expect(fetcher.calls).toEqual([]);
    expect(await exists(filePath)).toBe(true);
  });

  it('reports a failed download as the fetch stage', async () => {
    const transcriber = new Transcriber(config, { fetcher: new FailingFetcher() });

    const error = await captureOrchestrationError(transcriber.run('https://media.example.test/private'));

    expect(error.stage).toBe('fetch');
    expect(error.cause).toBeInstanceOf(FetchError);
  });

  it('reports a missing local file as the fetch stage', async () => {
    const transcriber = new Transcriber(config, { fetcher });

    const error = await captureOrchestrationError(
      transcriber.transcribeFile(path.join(workDir, 'absent.mp3'))
    );

    expect(error.stage).toBe('fetch');
    expect(error.cause).toBeInstanceOf(ValidationError);
  });

  it('reports a rejected chunk as the upload stage and still cleans up', async () => {
    const transport = new ScriptedTransport();
    transport.failChunk(0, permanent('Chunk rejected'));
    const transcriber = new Transcriber(config, {
      fetcher,
      transport,
      sessionStore: new MemorySessionStore(),
    });

    const error = await captureOrchestrationError(transcriber.run('https://media.example.test/watch?v=4'));

    expect(error.stage).toBe('upload');
    expect(error.cause).toBeInstanceOf(SessionFailureError);
    expect(transport.pollCalls).toEqual([]);
    expect(await exists(path.join(workDir, 'episode.mp3'))).toBe(false);
  });

  it('reports a failed job as the track stage', async () => {
    const transport = new ScriptedTransport();
    transport.statuses = [{ status: 'failed', error: 'no speech detected' }];
    const transcriber = new Transcriber(config, {
      fetcher,
      transport,
      sessionStore: new MemorySessionStore(),
    });

    const error = await captureOrchestrationError(transcriber.run('https://media.example.test/watch?v=5'));

    expect(error.stage).toBe('track');
    expect(error.cause).toBeInstanceOf(RemoteJobFailureError);
    expect(error.message).toBe('track stage failed: Job job-1 failed on the server: no speech detected');
  });
});
