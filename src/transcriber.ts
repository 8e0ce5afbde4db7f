/**
 * Main Transcriber class: fetch -> chunked upload -> job tracking
 */

import fs from 'fs/promises';
import path from 'path';
import type {
  RunOptions,
  RunProgress,
  TranscriberConfig,
  TranscriptionResult,
} from './types/config.js';
import type { TranscriptionJob } from './types/job.js';
import type { FileHandle, UploadOutcome, UploadProgress } from './types/session.js';
import { resolveConfig } from './lib/config.js';
import { createFileHandle, type Fetcher } from './lib/fetcher.js';
import { checkServer, type HealthCheckResult } from './lib/health.js';
import { JobTracker } from './lib/job-tracker.js';
import { FileSessionStore, type SessionStore } from './lib/session-store.js';
import type { Transport } from './lib/transport.js';
import { HttpTransport } from './lib/transport-fetch.js';
import { UploadSession } from './lib/upload-session.js';
import { validateFileSize } from './lib/validation.js';
import { YtDlpFetcher } from './lib/ytdlp-fetcher.js';
import { OrchestrationError, messageOf } from './utils/errors.js';
import { getLogger } from './utils/logger.js';

/**
 * Collaborators; anything left out is built from the configuration
 */
export interface TranscriberDependencies {
  fetcher?: Fetcher;
  transport?: Transport;
  sessionStore?: SessionStore;
}

const EMPTY_UPLOAD: UploadProgress = {
  bytesTotal: 0,
  bytesUploaded: 0,
  chunksTotal: 0,
  chunksAcked: 0,
};

/**
 * Client for a remote transcription service with chunked, resumable uploads
 */
export class Transcriber {
  private config: TranscriberConfig;
  private transport: Transport;
  private fetcher: Fetcher;
  private sessionStore: SessionStore;
  private tracker: JobTracker;
  private logger = getLogger();

  constructor(config: Partial<TranscriberConfig> = {}, deps: TranscriberDependencies = {}) {
    this.config = resolveConfig(config);

    this.transport =
      deps.transport ??
      new HttpTransport({
        baseUrl: this.config.serverUrl,
        apiKey: this.config.apiKey,
        timeout: this.config.timeout,
        debug: this.config.debug,
      });

    this.fetcher =
      deps.fetcher ??
      new YtDlpFetcher({
        downloadDir: this.config.downloadDir,
        audioQuality: this.config.audioQuality,
        maxFileSize: this.config.maxFileSize,
        ytdlpCmd: this.config.ytdlpCmd,
      });

    this.sessionStore = deps.sessionStore ?? new FileSessionStore(this.config.stateDir);
    this.tracker = new JobTracker(this.transport);
  }

  get settings(): Readonly<TranscriberConfig> {
    return this.config;
  }

  /**
   * Download a source URL, upload it and wait for the transcript
   * @throws OrchestrationError naming the failed stage
   */
  async run(sourceUrl: string, options: RunOptions = {}): Promise<TranscriptionResult> {
    const startTime = Date.now();
    this.reportProgress(options, { phase: 'fetching', ...EMPTY_UPLOAD });

    let file: FileHandle;
    try {
      file = await this.fetcher.fetch(sourceUrl, options.signal);
    } catch (error) {
      throw new OrchestrationError('fetch', error);
    }

    try {
      return await this.process(file, options, startTime);
    } finally {
      if (!this.config.keepLocalFiles) {
        await this.removeLocalFile(file);
      }
    }
  }

  /**
   * Upload a file already on disk and wait for the transcript.
   * The file is never deleted.
   */
  async transcribeFile(filePath: string, options: RunOptions = {}): Promise<TranscriptionResult> {
    const startTime = Date.now();
    this.reportProgress(options, { phase: 'fetching', ...EMPTY_UPLOAD });

    let file: FileHandle;
    try {
      file = await createFileHandle(filePath);
      validateFileSize(file.size, this.config.maxFileSize);
    } catch (error) {
      throw new OrchestrationError('fetch', error);
    }

    return this.process(file, options, startTime);
  }

  /**
   * Check that the configured server answers
   */
  async checkServer(): Promise<HealthCheckResult> {
    return checkServer(this.config.serverUrl);
  }

  private async process(
    file: FileHandle,
    options: RunOptions,
    startTime: number
  ): Promise<TranscriptionResult> {
    let upload: UploadProgress = {
      ...EMPTY_UPLOAD,
      bytesTotal: file.size,
    };
    this.reportProgress(options, { phase: 'uploading', ...upload });

    const session = new UploadSession({
      transport: this.transport,
      file,
      chunkSize: this.config.chunkSize,
      concurrency: this.config.concurrency,
      retry: {
        maxRetries: this.config.maxRetries,
        initialDelay: this.config.retryInitialDelay,
        maxDelay: this.config.retryMaxDelay,
        jitter: this.config.retryJitter,
      },
      store: this.sessionStore,
      signal: options.signal,
      onProgress: (progress) => {
        upload = progress;
        this.reportProgress(options, { phase: 'uploading', ...progress });
      },
      onStatusChange: (status) => {
        if (status === 'finalizing') {
          this.reportProgress(options, { phase: 'finalizing', ...upload });
        }
      },
    });

    let outcome: UploadOutcome;
    try {
      outcome = await session.driveToCompletion();
    } catch (error) {
      throw new OrchestrationError('upload', error);
    }

    if (options.wait === false) {
      const job: TranscriptionJob = { jobId: outcome.jobId, status: 'queued' };
      this.logger.info(`Job ${job.jobId} submitted; not waiting for completion`);
      this.reportProgress(options, { phase: 'complete', ...upload, jobStatus: job.status });
      return this.buildResult(job, outcome, file, startTime);
    }

    this.reportProgress(options, { phase: 'polling', ...upload });

    let job: TranscriptionJob;
    let outputPath: string | undefined;
    try {
      job = await this.tracker.waitForCompletion(outcome.jobId, {
        pollInterval: this.config.pollInterval,
        maxWait: this.config.pollTimeout,
        maxPollInterval: this.config.maxPollInterval,
        signal: options.signal,
        onStatus: (current) => {
          this.reportProgress(options, { phase: 'polling', ...upload, jobStatus: current.status });
        },
      });

      if (options.outputDir) {
        outputPath = await this.writeResult(job, options.outputDir);
      }
    } catch (error) {
      throw new OrchestrationError('track', error);
    }

    this.reportProgress(options, { phase: 'complete', ...upload, jobStatus: job.status });
    return this.buildResult(job, outcome, file, startTime, outputPath);
  }

  private buildResult(
    job: TranscriptionJob,
    outcome: UploadOutcome,
    file: FileHandle,
    startTime: number,
    outputPath?: string
  ): TranscriptionResult {
    return {
      job,
      sessionId: outcome.sessionId,
      file,
      outputPath,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Save the job record as transcription_<jobId>.json
   */
  private async writeResult(job: TranscriptionJob, outputDir: string): Promise<string> {
    await fs.mkdir(outputDir, { recursive: true });
    const outputPath = path.join(outputDir, `transcription_${job.jobId}.json`);
    await fs.writeFile(outputPath, JSON.stringify(job, null, 2), 'utf-8');
    this.logger.info(`Transcription result saved: ${outputPath}`);
    return outputPath;
  }

  private async removeLocalFile(file: FileHandle): Promise<void> {
    try {
      await fs.rm(file.path, { force: true });
      this.logger.debug(`Removed local file ${file.path}`);
    } catch (error) {
      this.logger.warn(`Could not remove ${file.path}`, { error: messageOf(error) });
    }
  }

  /**
   * Report progress to callback
   */
  private reportProgress(
    options: RunOptions,
    progress: Omit<RunProgress, 'percentComplete'>
  ): void {
    if (options.onProgress) {
      const percentComplete =
        progress.phase === 'complete'
          ? 100
          : progress.bytesTotal > 0
            ? Math.round((progress.bytesUploaded / progress.bytesTotal) * 100)
            : 0;
      options.onProgress({ ...progress, percentComplete });
    }
  }
}
