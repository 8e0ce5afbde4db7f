/**
 * Chunk planning and per-chunk transfer state
 */

import type {
  ChunkDescriptor,
  ChunkPlan,
  ChunkState,
  FileHandle,
} from '../types/session.js';
import { ChunkOutOfRangeError, ValidationError } from '../utils/errors.js';

/**
 * Split a file into fixed-size chunks. Every chunk has `chunkSize` bytes
 * except possibly the last; offsets partition [0, size) exactly.
 */
export function planChunks(file: Pick<FileHandle, 'size'>, chunkSize: number): ChunkPlan {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError(`chunkSize must be a positive integer (got ${chunkSize})`, 'chunkSize');
  }
  if (!Number.isInteger(file.size) || file.size <= 0) {
    throw new ValidationError(`Cannot plan an empty file (size ${file.size})`, 'size');
  }

  const chunkCount = Math.ceil(file.size / chunkSize);
  const chunks: ChunkDescriptor[] = [];

  for (let index = 0; index < chunkCount; index++) {
    const offset = index * chunkSize;
    chunks.push({
      index,
      offset,
      length: Math.min(chunkSize, file.size - offset),
    });
  }

  return { fileSize: file.size, chunkSize, chunks };
}

/**
 * Tracks transfer state for every chunk of a plan.
 *
 * Ownership: an index handed out by `claimNext` belongs to that caller until
 * it calls `markAcked` or `release`; no other caller can claim it meanwhile.
 * All methods are synchronous, so each transition is atomic on the event loop.
 */
export class ChunkStore {
  private states: ChunkState[];
  private owned = new Set<number>();

  constructor(public readonly plan: ChunkPlan) {
    this.states = plan.chunks.map(() => ({ status: 'pending', attempts: 0 }));
  }

  get size(): number {
    return this.plan.chunks.length;
  }

  descriptor(index: number): ChunkDescriptor {
    this.assertInRange(index);
    return this.plan.chunks[index];
  }

  stateOf(index: number): Readonly<ChunkState> {
    this.assertInRange(index);
    return this.states[index];
  }

  /**
   * Indices still to upload (pending or failed), ascending
   */
  pendingIndices(): number[] {
    const indices: number[] = [];
    this.states.forEach((state, index) => {
      if (state.status === 'pending' || state.status === 'failed') {
        indices.push(index);
      }
    });
    return indices;
  }

  ackedIndices(): number[] {
    const indices: number[] = [];
    this.states.forEach((state, index) => {
      if (state.status === 'acked') {
        indices.push(index);
      }
    });
    return indices;
  }

  isComplete(): boolean {
    return this.states.every((state) => state.status === 'acked');
  }

  ackedBytes(): number {
    return this.ackedIndices().reduce((sum, index) => sum + this.plan.chunks[index].length, 0);
  }

  /**
   * Take ownership of the lowest unowned pending index and start an attempt
   */
  claimNext(): number | undefined {
    const index = this.pendingIndices().find((candidate) => !this.owned.has(candidate));
    if (index === undefined) {
      return undefined;
    }

    this.owned.add(index);
    this.markInFlight(index);
    return index;
  }

  /**
   * Start another attempt on an index the caller already owns
   */
  markInFlight(index: number): void {
    this.assertInRange(index);
    const state = this.states[index];
    state.status = 'in_flight';
    state.attempts += 1;
  }

  markAcked(index: number): void {
    this.assertInRange(index);
    const state = this.states[index];
    state.status = 'acked';
    state.lastError = undefined;
    this.owned.delete(index);
  }

  markFailed(index: number, error: string): void {
    this.assertInRange(index);
    const state = this.states[index];
    state.status = 'failed';
    state.lastError = error;
  }

  /**
   * Give up ownership without acking
   */
  release(index: number): void {
    this.assertInRange(index);
    this.owned.delete(index);
  }

  /**
   * Mark chunks acked by a resumed session. Out-of-range indices throw.
   */
  restoreAcked(indices: Iterable<number>): void {
    for (const index of indices) {
      this.markAcked(index);
    }
  }

  private assertInRange(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.states.length) {
      throw new ChunkOutOfRangeError(index, this.states.length);
    }
  }
}
