/**
 * Checksum utilities
 */

import fs from 'fs/promises';
import { sha256 } from 'multiformats/hashes/sha2';

/**
 * Compute the SHA-256 checksum of a file (lower-case hex)
 */
export async function computeFileChecksum(filePath: string): Promise<string> {
  let fileBuffer: Buffer;
  try {
    fileBuffer = await fs.readFile(filePath);
  } catch (error) {
    throw new Error(`Checksum computation failed for ${filePath}`, { cause: error });
  }

  return computeChecksum(fileBuffer);
}

/**
 * Compute the SHA-256 checksum of a buffer (lower-case hex)
 */
export async function computeChecksum(data: Uint8Array): Promise<string> {
  const hash = await sha256.digest(data);
  return toHex(hash.digest);
}

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}
