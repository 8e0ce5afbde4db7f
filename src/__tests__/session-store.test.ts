import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileSessionStore, MemorySessionStore } from '../lib/session-store.js';
import type { SessionRecord } from '../types/session.js';

const record: SessionRecord = {
  sessionId: 'session-1',
  checksum: 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9',
  fileSize: 11,
  chunkSize: 4,
  acked: [0, 2],
  updatedAt: '2026-01-01T00:00:00.000Z',
};

describe('FileSessionStore', () => {
  let stateDir: string;
  let store: FileSessionStore;

  beforeEach(async () => {
    stateDir = await fs.mkdtemp(path.join(os.tmpdir(), 'session-store-'));
    store = new FileSessionStore(path.join(stateDir, 'sessions'));
  });

  afterEach(async () => {
    await fs.rm(stateDir, { recursive: true, force: true });
  });

  it('saves and loads a record', async () => {
    await store.save(record.checksum, record);

    await expect(store.load(record.checksum)).resolves.toEqual(record);
  });

  it('returns undefined for a key it has never seen', async () => {
    await expect(store.load('unknown')).resolves.toBeUndefined();
  });

  it('keeps keys inside the state directory', async () => {
    await store.save('../escape/key', record);

    const files = await fs.readdir(path.join(stateDir, 'sessions'));
    expect(files).toEqual(['___escape_key.json']);
  });

  it('treats a corrupt file as absent', async () => {
    await fs.mkdir(path.join(stateDir, 'sessions'), { recursive: true });
    await fs.writeFile(path.join(stateDir, 'sessions', 'broken.json'), '{ not json');

    await expect(store.load('broken')).resolves.toBeUndefined();
  });

  it('treats a record with invalid fields as absent', async () => {
    await fs.mkdir(path.join(stateDir, 'sessions'), { recursive: true });
    await fs.writeFile(
      path.join(stateDir, 'sessions', 'bad.json'),
      JSON.stringify({ ...record, acked: [-1] })
    );

    await expect(store.load('bad')).resolves.toBeUndefined();
  });

  it('deletes records, and deleting twice is harmless', async () => {
    await store.save(record.checksum, record);
    await store.delete(record.checksum);
    await store.delete(record.checksum);

    await expect(store.load(record.checksum)).resolves.toBeUndefined();
  });
});

describe('MemorySessionStore', () => {
  it('hands out copies', async () => {
    const store = new MemorySessionStore();
    await store.save('key', record);

    const loaded = await store.load('key');
    loaded?.acked.push(9);

    expect((await store.load('key'))?.acked).toEqual([0, 2]);
  });
});
