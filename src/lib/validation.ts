/**
 * Validation utilities for configuration and files
 */

import { ValidationError } from '../utils/errors.js';
import type { AudioQuality } from '../types/config.js';

export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 16;

const AUDIO_QUALITIES: readonly AudioQuality[] = ['best', 'good', 'fast'];

// Characters not allowed in downloaded file names
const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;
const MAX_FILENAME_LENGTH = 200;

/**
 * Validate server URL
 */
export function validateServerUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationError(`Invalid server URL: ${url}`, 'serverUrl');
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(
      `Invalid server URL: protocol must be http or https`,
      'serverUrl'
    );
  }
}

/**
 * Validate a strictly positive integer setting
 */
export function validatePositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer (got ${value})`, field);
  }
}

/**
 * Validate a non-negative integer setting
 */
export function validateNonNegativeInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer (got ${value})`, field);
  }
}

export function validateConcurrency(value: number): void {
  if (!Number.isInteger(value) || value < MIN_CONCURRENCY || value > MAX_CONCURRENCY) {
    throw new ValidationError(
      `concurrency must be an integer between ${MIN_CONCURRENCY} and ${MAX_CONCURRENCY} (got ${value})`,
      'concurrency'
    );
  }
}

export function isAudioQuality(value: string): value is AudioQuality {
  return AUDIO_QUALITIES.some((quality) => quality === value);
}

export function validateAudioQuality(value: string): AudioQuality {
  if (!isAudioQuality(value)) {
    throw new ValidationError(
      `audioQuality must be one of ${AUDIO_QUALITIES.join(', ')} (got ${value})`,
      'audioQuality'
    );
  }
  return value;
}

/**
 * Validate file size against the configured limit
 */
export function validateFileSize(size: number, maxFileSize: number): void {
  if (size <= 0) {
    throw new ValidationError('File size must be greater than 0', 'size');
  }
  if (size > maxFileSize) {
    throw new ValidationError(
      `File size (${formatBytes(size)}) exceeds maximum allowed size (${formatBytes(maxFileSize)})`,
      'size'
    );
  }
}

/**
 * Replace characters that are unsafe in file names and cap the length
 */
export function sanitizeFileName(fileName: string): string {
  const cleaned = fileName.replace(UNSAFE_FILENAME_CHARS, '_').trim();
  return cleaned.slice(0, MAX_FILENAME_LENGTH) || 'download';
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';

  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return `${(bytes / Math.pow(k, i)).toFixed(2)} ${sizes[i]}`;
}
