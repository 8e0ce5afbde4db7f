/**
 * Fetcher contract and local file identity
 */

import type { Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import type { FileHandle } from '../types/session.js';
import { computeFileChecksum } from '../utils/hash.js';
import { ValidationError } from '../utils/errors.js';

/**
 * Produces a local file for a source URL. Implementations reject with
 * FetchError (unsupported_source, network_error, restricted_content).
 */
export interface Fetcher {
  fetch(url: string, signal?: AbortSignal): Promise<FileHandle>;
}

export type FileMetadata = Pick<FileHandle, 'title' | 'durationSeconds' | 'contentType'>;

/**
 * Stat and hash a local file
 */
export async function createFileHandle(
  filePath: string,
  metadata: FileMetadata = {}
): Promise<FileHandle> {
  const absolutePath = path.resolve(filePath);

  let stats: Stats;
  try {
    stats = await fs.stat(absolutePath);
  } catch {
    throw new ValidationError(`File not found: ${absolutePath}`, 'path');
  }
  if (!stats.isFile()) {
    throw new ValidationError(`Not a regular file: ${absolutePath}`, 'path');
  }

  const fileName = path.basename(absolutePath);
  return {
    path: absolutePath,
    fileName,
    size: stats.size,
    checksum: await computeFileChecksum(absolutePath),
    contentType: metadata.contentType ?? getMimeType(fileName),
    title: metadata.title,
    durationSeconds: metadata.durationSeconds,
  };
}

/**
 * Get file extension from filename
 */
export function getExtension(filename: string): string {
  const lastDot = filename.lastIndexOf('.');
  return lastDot === -1 ? '' : filename.slice(lastDot + 1).toLowerCase();
}

/**
 * Get MIME type from filename
 */
export function getMimeType(filename: string): string {
  const ext = getExtension(filename);

  const mimeTypes: Record<string, string> = {
    // Audio
    'mp3': 'audio/mpeg',
    'm4a': 'audio/mp4',
    'aac': 'audio/aac',
    'wav': 'audio/wav',
    'ogg': 'audio/ogg',
    'opus': 'audio/opus',
    'flac': 'audio/flac',

    // Video
    'mp4': 'video/mp4',
    'webm': 'video/webm',
    'mkv': 'video/x-matroska',
    'mov': 'video/quicktime',
  };

  return mimeTypes[ext] || 'application/octet-stream';
}
