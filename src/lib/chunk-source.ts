/**
 * Readers that produce the bytes of a chunk
 */

import fs from 'fs/promises';
import type { ChunkDescriptor } from '../types/session.js';

export interface ChunkSource {
  read(chunk: ChunkDescriptor): Promise<Uint8Array>;
}

/**
 * Reads byte ranges straight from disk, one chunk at a time
 */
export class FileChunkSource implements ChunkSource {
  constructor(private readonly filePath: string) {}

  async read(chunk: ChunkDescriptor): Promise<Uint8Array> {
    const handle = await fs.open(this.filePath, 'r');
    try {
      const buffer = Buffer.alloc(chunk.length);
      const { bytesRead } = await handle.read(buffer, 0, chunk.length, chunk.offset);
      if (bytesRead !== chunk.length) {
        throw new Error(
          `Short read for chunk ${chunk.index}: expected ${chunk.length} bytes, got ${bytesRead} (file changed?)`
        );
      }
      return buffer;
    } finally {
      await handle.close();
    }
  }
}

/**
 * Serves chunks from a buffer already in memory
 */
export class BufferChunkSource implements ChunkSource {
  constructor(private readonly data: Uint8Array) {}

  async read(chunk: ChunkDescriptor): Promise<Uint8Array> {
    return this.data.subarray(chunk.offset, chunk.offset + chunk.length);
  }
}
