/**
 * Configuration defaults, environment loading and validation
 */

import os from 'os';
import path from 'path';
import type { TranscriberConfig } from '../types/config.js';
import { ValidationError } from '../utils/errors.js';
import {
  validateAudioQuality,
  validateConcurrency,
  validateNonNegativeInteger,
  validatePositiveInteger,
  validateServerUrl,
} from './validation.js';

const MiB = 1024 * 1024;

export const DEFAULT_CONFIG: TranscriberConfig = {
  serverUrl: 'http://localhost:8000',
  chunkSize: 8 * MiB,
  concurrency: 3,
  maxRetries: 3,
  timeout: 300000, // 5 minutes
  retryInitialDelay: 1000,
  retryMaxDelay: 30000,
  retryJitter: true,
  pollInterval: 5000,
  maxPollInterval: 60000,
  pollTimeout: 600000, // 10 minutes
  downloadDir: './downloads',
  stateDir: path.join(os.homedir(), '.transcribe-uploader', 'sessions'),
  audioQuality: 'best',
  keepLocalFiles: false,
  maxFileSize: 500 * MiB,
  ytdlpCmd: 'yt-dlp',
  debug: false,
};

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveConfig(overrides: Partial<TranscriberConfig> = {}): TranscriberConfig {
  const config: TranscriberConfig = { ...DEFAULT_CONFIG };

  // Skip explicit undefined so it does not clobber a default
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Reflect.set(config, key, value);
    }
  }

  validateConfig(config);
  return {
    ...config,
    serverUrl: config.serverUrl.replace(/\/+$/, ''),
  };
}

export function validateConfig(config: TranscriberConfig): void {
  validateServerUrl(config.serverUrl);
  validatePositiveInteger(config.chunkSize, 'chunkSize');
  validateConcurrency(config.concurrency);
  validateNonNegativeInteger(config.maxRetries, 'maxRetries');
  validatePositiveInteger(config.timeout, 'timeout');
  validateNonNegativeInteger(config.retryInitialDelay, 'retryInitialDelay');
  validateNonNegativeInteger(config.retryMaxDelay, 'retryMaxDelay');
  validatePositiveInteger(config.pollInterval, 'pollInterval');
  validatePositiveInteger(config.maxPollInterval, 'maxPollInterval');
  validatePositiveInteger(config.pollTimeout, 'pollTimeout');
  validatePositiveInteger(config.maxFileSize, 'maxFileSize');
  validateAudioQuality(config.audioQuality);

  if (config.maxPollInterval < config.pollInterval) {
    throw new ValidationError(
      'maxPollInterval must not be smaller than pollInterval',
      'maxPollInterval'
    );
  }
}

/**
 * Read configuration overrides from environment variables
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<TranscriberConfig> {
  return {
    serverUrl: env.TRANSCRIBER_SERVER_URL,
    apiKey: env.TRANSCRIBER_API_KEY || undefined,
    chunkSize: readInt(env, 'TRANSCRIBER_CHUNK_SIZE'),
    concurrency: readInt(env, 'TRANSCRIBER_CONCURRENCY'),
    maxRetries: readInt(env, 'TRANSCRIBER_MAX_RETRIES'),
    timeout: readInt(env, 'TRANSCRIBER_TIMEOUT_MS'),
    retryInitialDelay: readInt(env, 'TRANSCRIBER_RETRY_INITIAL_DELAY_MS'),
    retryMaxDelay: readInt(env, 'TRANSCRIBER_RETRY_MAX_DELAY_MS'),
    retryJitter: readBool(env, 'TRANSCRIBER_RETRY_JITTER'),
    pollInterval: readInt(env, 'TRANSCRIBER_POLL_INTERVAL_MS'),
    maxPollInterval: readInt(env, 'TRANSCRIBER_MAX_POLL_INTERVAL_MS'),
    pollTimeout: readInt(env, 'TRANSCRIBER_POLL_TIMEOUT_MS'),
    downloadDir: env.TRANSCRIBER_DOWNLOAD_DIR,
    stateDir: env.TRANSCRIBER_STATE_DIR,
    audioQuality:
      env.TRANSCRIBER_AUDIO_QUALITY !== undefined
        ? validateAudioQuality(env.TRANSCRIBER_AUDIO_QUALITY)
        : undefined,
    keepLocalFiles: readBool(env, 'TRANSCRIBER_KEEP_LOCAL_FILES'),
    maxFileSize: readInt(env, 'TRANSCRIBER_MAX_FILE_SIZE'),
    ytdlpCmd: env.YTDLP_CMD,
    debug: readBool(env, 'DEBUG'),
  };
}

function readInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${name} must be an integer (got "${raw}")`, name);
  }
  return value;
}

function readBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}
