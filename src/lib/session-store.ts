/**
 * Durable resume records for upload sessions
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { SessionRecord } from '../types/session.js';
import { getLogger } from '../utils/logger.js';

export interface SessionStore {
  load(key: string): Promise<SessionRecord | undefined>;
  save(key: string, record: SessionRecord): Promise<void>;
  delete(key: string): Promise<void>;
}

const SessionRecordSchema = z.object({
  sessionId: z.string().min(1),
  checksum: z.string(),
  fileSize: z.number().int().positive(),
  chunkSize: z.number().int().positive(),
  acked: z.array(z.number().int().nonnegative()),
  updatedAt: z.string(),
});

/**
 * In-memory store; records live as long as the process
 */
export class MemorySessionStore implements SessionStore {
  private records = new Map<string, SessionRecord>();

  async load(key: string): Promise<SessionRecord | undefined> {
    const record = this.records.get(key);
    return record ? { ...record, acked: [...record.acked] } : undefined;
  }

  async save(key: string, record: SessionRecord): Promise<void> {
    this.records.set(key, { ...record, acked: [...record.acked] });
  }

  async delete(key: string): Promise<void> {
    this.records.delete(key);
  }
}

/**
 * One JSON file per key under a state directory
 */
export class FileSessionStore implements SessionStore {
  private logger = getLogger();

  constructor(private readonly stateDir: string) {}

  async load(key: string): Promise<SessionRecord | undefined> {
    const filePath = this.pathFor(key);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`Ignoring unreadable session record ${filePath}`, error);
      return undefined;
    }

    const parsed = SessionRecordSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn(`Ignoring malformed session record ${filePath}`, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return undefined;
    }
    return parsed.data;
  }

  async save(key: string, record: SessionRecord): Promise<void> {
    await fs.mkdir(this.stateDir, { recursive: true });

    // Write then rename so a crash never leaves a half-written record
    const filePath = this.pathFor(key);
    const tmpPath = `${filePath}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(record, null, 2), 'utf-8');
    await fs.rename(tmpPath, filePath);
  }

  async delete(key: string): Promise<void> {
    await fs.rm(this.pathFor(key), { force: true });
  }

  private pathFor(key: string): string {
    const safeKey = key.replace(/[^a-zA-Z0-9_-]/g, '_');
    return path.join(this.stateDir, `${safeKey}.json`);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
