import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { EXIT_FAILURE, EXIT_SUCCESS, main, parseCliArgs } from '../cli.js';
import { createApp } from '../server/app.js';
import { ValidationError } from '../utils/errors.js';
import { initLogger } from '../utils/logger.js';
import { listen, type RunningServer } from './helpers/server.js';

describe('parseCliArgs', () => {
  it('takes a URL with default options', () => {
    expect(parseCliArgs(['https://media.example.test/v'])).toEqual({
      source: { kind: 'url', url: 'https://media.example.test/v' },
      overrides: {},
      wait: true,
      outputDir: undefined,
      verbose: false,
      test: false,
      help: false,
    });
  });

  it('maps flags onto configuration overrides', () => {
    const options = parseCliArgs([
      '--file', 'talk.mp3',
      '-s', 'http://transcribe.example.test',
      '--chunk-size', '1024',
      '-c', '4',
      '--no-wait',
      '--keep-local',
      '-v',
      '-o', 'out',
    ]);

    expect(options.source).toEqual({ kind: 'file', path: 'talk.mp3' });
    expect(options.overrides).toEqual({
      serverUrl: 'http://transcribe.example.test',
      chunkSize: 1024,
      concurrency: 4,
      keepLocalFiles: true,
      debug: true,
    });
    expect(options.wait).toBe(false);
    expect(options.outputDir).toBe('out');
    expect(options.verbose).toBe(true);
  });

  it('takes an audio quality', () => {
    expect(parseCliArgs(['https://a.test', '-q', 'fast']).overrides).toEqual({ audioQuality: 'fast' });
    expect(() => parseCliArgs(['https://a.test', '--quality', 'lossless'])).toThrow(
      'audioQuality must be one of best, good, fast (got lossless)'
    );
  });

  it('allows --test without a source', () => {
    expect(parseCliArgs(['--test']).source).toBeUndefined();
  });

  it('rejects bad input', () => {
    expect(() => parseCliArgs([])).toThrow('A URL or --file is required');
    expect(() => parseCliArgs(['https://a.test', '--file', 'b.mp3'])).toThrow(
      'Give either a URL or --file, not both'
    );
    expect(() => parseCliArgs(['https://a.test', '--chunk-size', 'big'])).toThrow(
      '--chunk-size must be a positive integer (got "big")'
    );
    expect(() => parseCliArgs(['https://a.test', '--bogus'])).toThrow(ValidationError);
  });
});

describe('main', () => {
  let server: RunningServer;
  let workDir: string;

  beforeAll(async () => {
    server = await listen(createApp());
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    initLogger({ silent: true });
    await fs.rm(workDir, { recursive: true, force: true });
  });

  function env(): NodeJS.ProcessEnv {
    return {
      TRANSCRIBER_POLL_INTERVAL_MS: '10',
      TRANSCRIBER_MAX_POLL_INTERVAL_MS: '10',
      TRANSCRIBER_STATE_DIR: path.join(workDir, 'state'),
    };
  }

  it('prints usage for --help', async () => {
    await expect(main(['--help'], {})).resolves.toBe(EXIT_SUCCESS);
  });

  it('fails on invalid arguments', async () => {
    await expect(main([], {})).resolves.toBe(EXIT_FAILURE);
  });

  it('fails on an invalid environment', async () => {
    await expect(main(['https://a.test'], { TRANSCRIBER_CONCURRENCY: '99' })).resolves.toBe(
      EXIT_FAILURE
    );
  });

  it('checks the server with --test', async () => {
    await expect(main(['--test', '--server', server.url], env())).resolves.toBe(EXIT_SUCCESS);
  });

  it('transcribes a local file end to end', async () => {
    const filePath = path.join(workDir, 'memo.mp3');
    await fs.writeFile(filePath, 'spoken words');

    const code = await main(['--file', filePath, '--server', server.url, '--chunk-size', '5'], env());

    expect(code).toBe(EXIT_SUCCESS);
  });

  it('turns on debug logging from DEBUG in the environment', async () => {
    const filePath = path.join(workDir, 'memo.mp3');
    await fs.writeFile(filePath, 'spoken words');

    const code = await main(['--file', filePath, '--server', server.url], { ...env(), DEBUG: 'true' });

    expect(code).toBe(EXIT_SUCCESS);
    const logged = vi.mocked(console.error).mock.calls.map((call) => String(call[0]));
    expect(logged.some((line) => line.includes(`HTTP Request: POST ${server.url}/sessions`))).toBe(true);
  });

  it('keeps debug logging off by default', async () => {
    const filePath = path.join(workDir, 'memo.mp3');
    await fs.writeFile(filePath, 'spoken words');

    await main(['--file', filePath, '--server', server.url], env());

    const logged = vi.mocked(console.error).mock.calls.map((call) => String(call[0]));
    expect(logged.some((line) => line.includes('HTTP Request:'))).toBe(false);
  });

  it('exits with 1 when the file is missing', async () => {
    const code = await main(['--file', path.join(workDir, 'absent.mp3'), '--server', server.url], env());

    expect(code).toBe(EXIT_FAILURE);
  });
});
