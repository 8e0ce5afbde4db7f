/**
 * Fetcher backed by the yt-dlp executable
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { AudioQuality } from '../types/config.js';
import type { FileHandle } from '../types/session.js';
import { CancelledError, FetchError, type FetchErrorKind } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { CommandError, runCommand } from '../utils/process.js';
import { createFileHandle, type Fetcher } from './fetcher.js';
import { sanitizeFileName, validateFileSize } from './validation.js';

export interface YtDlpFetcherConfig {
  downloadDir: string;
  audioQuality: AudioQuality;
  maxFileSize: number;
  ytdlpCmd: string;
  /** Kill yt-dlp after this long (ms) */
  timeoutMs?: number;
}

const FORMAT_BY_QUALITY: Record<AudioQuality, string> = {
  best: 'bestaudio/best',
  good: 'bestaudio[abr<=128]/best[abr<=128]',
  fast: 'worstaudio/worst',
};

const VideoInfoSchema = z
  .object({
    id: z.string(),
    title: z.string().optional(),
    duration: z.number().optional(),
  })
  .passthrough();

const UNSUPPORTED_PATTERNS = [/unsupported url/i, /is not a valid url/i, /no video formats found/i];

const RESTRICTED_PATTERNS = [
  /private video/i,
  /sign in to confirm/i,
  /members[- ]only/i,
  /age[- ]restricted/i,
  /not available in your country/i,
  /copyright/i,
  /video unavailable/i,
];

/**
 * Map yt-dlp's stderr onto a fetch error kind
 */
export function classifyYtDlpFailure(stderr: string): FetchErrorKind {
  if (UNSUPPORTED_PATTERNS.some((pattern) => pattern.test(stderr))) {
    return 'unsupported_source';
  }
  if (RESTRICTED_PATTERNS.some((pattern) => pattern.test(stderr))) {
    return 'restricted_content';
  }
  return 'network_error';
}

export class YtDlpFetcher implements Fetcher {
  private logger = getLogger();

  constructor(private readonly config: YtDlpFetcherConfig) {}

  async fetch(url: string, signal?: AbortSignal): Promise<FileHandle> {
    assertHttpUrl(url);

    const info = await this.fetchInfo(url, signal);
    const baseName = sanitizeFileName(info.title ?? info.id);

    await fs.mkdir(this.config.downloadDir, { recursive: true });
    const template = path.join(this.config.downloadDir, `${baseName}.%(ext)s`);

    this.logger.info(`Downloading audio: ${info.title ?? info.id}`);
    const { stdout } = await this.run(
      [
        '--format', FORMAT_BY_QUALITY[this.config.audioQuality],
        '--extract-audio',
        '--audio-format', 'mp3',
        '--audio-quality', this.config.audioQuality === 'best' ? '0' : '5',
        '--no-progress',
        '--no-warnings',
        '--output', template,
        '--print', 'after_move:filepath',
        '--no-simulate',
        url,
      ],
      signal
    );

    const filePath = lastLine(stdout);
    if (!filePath) {
      throw new FetchError('yt-dlp did not report a downloaded file', 'network_error');
    }

    const handle = await createFileHandle(filePath, {
      title: info.title,
      durationSeconds: info.duration,
    });

    try {
      validateFileSize(handle.size, this.config.maxFileSize);
    } catch (error) {
      await fs.rm(handle.path, { force: true });
      throw error;
    }

    this.logger.info(`Downloaded ${handle.fileName}`, { size: handle.size });
    return handle;
  }

  private async fetchInfo(url: string, signal?: AbortSignal): Promise<z.infer<typeof VideoInfoSchema>> {
    const { stdout } = await this.run(
      ['--dump-single-json', '--skip-download', '--no-warnings', url],
      signal
    );

    let data: unknown;
    try {
      data = JSON.parse(stdout);
    } catch (error) {
      throw new FetchError('yt-dlp returned unreadable metadata', 'network_error', { cause: error });
    }

    const parsed = VideoInfoSchema.safeParse(data);
    if (!parsed.success) {
      throw new FetchError('yt-dlp metadata is missing the video id', 'unsupported_source');
    }
    return parsed.data;
  }

  private async run(args: string[], signal?: AbortSignal) {
    try {
      return await runCommand(this.config.ytdlpCmd, args, {
        timeoutMs: this.config.timeoutMs,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      if (error instanceof CommandError) {
        const stderr = error.stderr;
        if (/ENOENT/.test(stderr)) {
          throw new FetchError(
            `${this.config.ytdlpCmd} not found; install yt-dlp or set YTDLP_CMD`,
            'network_error',
            { cause: error }
          );
        }
        const detail = lastLine(stderr) || error.message;
        throw new FetchError(detail, classifyYtDlpFailure(stderr), { cause: error });
      }
      throw error;
    }
  }
}

function assertHttpUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new FetchError(`Not a URL: ${url}`, 'unsupported_source');
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new FetchError(`Unsupported protocol ${parsed.protocol}`, 'unsupported_source');
  }
}

function lastLine(text: string): string {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1] ?? '';
}
