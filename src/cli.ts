/**
 * Command-line front end: argument parsing, spinners and exit codes
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { parseArgs } from 'util';
import { loadConfigFromEnv } from './lib/config.js';
import { formatBytes, validateAudioQuality } from './lib/validation.js';
import { Transcriber } from './transcriber.js';
import type { RunProgress, TranscriberConfig, TranscriptionResult } from './types/config.js';
import { describeError, messageOf, ValidationError } from './utils/errors.js';
import { initLogger } from './utils/logger.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export const USAGE = `Usage: transcribe-uploader <url | --file path> [options]

Options:
  -f, --file <path>         Upload a local file instead of downloading a URL
  -s, --server <url>        Transcription server URL
      --chunk-size <bytes>  Chunk size in bytes
  -c, --concurrency <n>     Parallel chunk uploads (1-16)
      --no-wait             Return once the job is submitted
  -o, --output <dir>        Write the job result as JSON into this directory
  -q, --quality <level>     Audio quality to download: best, good or fast
      --keep-local          Keep downloaded files
  -v, --verbose             Debug logging
      --test                Check that the server is reachable and exit
  -h, --help                Show this help`;

const CLI_OPTIONS = {
  file: { type: 'string', short: 'f' },
  server: { type: 'string', short: 's' },
  'chunk-size': { type: 'string' },
  concurrency: { type: 'string', short: 'c' },
  'no-wait': { type: 'boolean' },
  output: { type: 'string', short: 'o' },
  quality: { type: 'string', short: 'q' },
  'keep-local': { type: 'boolean' },
  verbose: { type: 'boolean', short: 'v' },
  test: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

export type CliSource = { kind: 'url'; url: string } | { kind: 'file'; path: string };

export interface CliOptions {
  source?: CliSource;
  overrides: Partial<TranscriberConfig>;
  wait: boolean;
  outputDir?: string;
  verbose: boolean;
  test: boolean;
  help: boolean;
}

/**
 * Parse argv (without node and script path)
 * @throws ValidationError on unknown flags or bad values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = readArgs(argv);
  const help = values.help ?? false;
  const test = values.test ?? false;

  if (positionals.length > 1) {
    throw new ValidationError(`Expected one URL, got ${positionals.length}`, 'url');
  }
  if (positionals.length === 1 && values.file !== undefined) {
    throw new ValidationError('Give either a URL or --file, not both', 'file');
  }

  let source: CliSource | undefined;
  if (values.file !== undefined) {
    source = { kind: 'file', path: values.file };
  } else if (positionals[0] !== undefined) {
    source = { kind: 'url', url: positionals[0] };
  } else if (!help && !test) {
    throw new ValidationError('A URL or --file is required', 'url');
  }

  const overrides: Partial<TranscriberConfig> = {};
  if (values.server !== undefined) overrides.serverUrl = values.server;
  if (values['chunk-size'] !== undefined) {
    overrides.chunkSize = parseInteger(values['chunk-size'], '--chunk-size');
  }
  if (values.concurrency !== undefined) {
    overrides.concurrency = parseInteger(values.concurrency, '--concurrency');
  }
  if (values.quality !== undefined) overrides.audioQuality = validateAudioQuality(values.quality);
  if (values['keep-local']) overrides.keepLocalFiles = true;
  if (values.verbose) overrides.debug = true;

  return {
    source,
    overrides,
    wait: !values['no-wait'],
    outputDir: values.output,
    verbose: values.verbose ?? false,
    test,
    help,
  };
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, strict: true, options: CLI_OPTIONS });
  } catch (error) {
    throw new ValidationError(messageOf(error));
  }
}

function parseInteger(raw: string, flag: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(`${flag} must be a positive integer (got "${raw}")`, flag);
  }
  return Number(raw);
}

/**
 * Run the CLI and resolve with the process exit code
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    console.error(chalk.red(`Error: ${messageOf(error)}`));
    console.error(USAGE);
    return EXIT_FAILURE;
  }

  if (options.help) {
    console.log(USAGE);
    return EXIT_SUCCESS;
  }

  let transcriber: Transcriber;
  try {
    transcriber = new Transcriber({ ...loadConfigFromEnv(env), ...options.overrides });
  } catch (error) {
    console.error(chalk.red(`Configuration error: ${messageOf(error)}`));
    return EXIT_FAILURE;
  }

  // --verbose lands in the same setting as DEBUG from the environment
  initLogger({ debug: transcriber.settings.debug });

  if (options.test) {
    return testServer(transcriber);
  }

  const source = options.source;
  if (!source) {
    console.error(USAGE);
    return EXIT_FAILURE;
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    console.error(chalk.yellow('\nInterrupted, cancelling...'));
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  const spinner = ora(source.kind === 'url' ? 'Downloading audio...' : 'Reading file...').start();
  const runOptions = {
    signal: controller.signal,
    wait: options.wait,
    outputDir: options.outputDir,
    onProgress: (progress: RunProgress) => renderProgress(spinner, progress),
  };

  try {
    const result =
      source.kind === 'url'
        ? await transcriber.run(source.url, runOptions)
        : await transcriber.transcribeFile(source.path, runOptions);

    spinner.succeed(
      result.job.status === 'succeeded' ? 'Transcription complete' : 'Transcription job submitted'
    );
    printResult(result);
    return EXIT_SUCCESS;
  } catch (error) {
    if (controller.signal.aborted) {
      spinner.warn('Cancelled');
      return EXIT_INTERRUPTED;
    }
    spinner.fail('Transcription failed');
    console.error(chalk.red.bold('\n✗ ' + describeError(error)));
    return EXIT_FAILURE;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

async function testServer(transcriber: Transcriber): Promise<number> {
  const serverUrl = transcriber.settings.serverUrl;
  const spinner = ora(`Checking ${serverUrl}...`).start();
  const health = await transcriber.checkServer();

  if (health.reachable) {
    spinner.succeed(`Server reachable at ${health.url} (HTTP ${health.statusCode})`);
    return EXIT_SUCCESS;
  }
  spinner.fail(`Server not reachable at ${serverUrl}`);
  return EXIT_FAILURE;
}

function renderProgress(spinner: Ora, progress: RunProgress): void {
  switch (progress.phase) {
    case 'fetching':
      break;
    case 'uploading':
      spinner.text =
        `Uploading ${progress.chunksAcked}/${progress.chunksTotal} chunks ` +
        `(${formatBytes(progress.bytesUploaded)} of ${formatBytes(progress.bytesTotal)}, ` +
        `${progress.percentComplete}%)`;
      break;
    case 'finalizing':
      spinner.text = 'Finalizing upload...';
      break;
    case 'polling':
      spinner.text = `Waiting for transcription${progress.jobStatus ? ` (${progress.jobStatus})` : ''}...`;
      break;
    case 'complete':
      spinner.text = 'Done';
      break;
  }
}

function printResult(result: TranscriptionResult): void {
  const { job } = result;
  console.log(chalk.green.bold('\n✓ ' + (job.status === 'succeeded' ? 'Transcription complete!' : 'Upload complete!')));
  console.log(chalk.gray(`Job ID: ${job.jobId}`));
  console.log(chalk.gray(`Session ID: ${result.sessionId}`));
  console.log(chalk.gray(`File: ${result.file.fileName} (${formatBytes(result.file.size)})`));
  console.log(chalk.gray(`Status: ${job.status}`));

  if (job.result?.transcriptUrl) {
    console.log(`Transcript: ${job.result.transcriptUrl}`);
  }
  if (job.result?.text) {
    console.log(`\n${job.result.text}`);
  }
  if (result.outputPath) {
    console.log(chalk.gray(`Saved to: ${result.outputPath}`));
  }
  console.log(chalk.gray(`Took ${(result.durationMs / 1000).toFixed(1)}s`));
}
