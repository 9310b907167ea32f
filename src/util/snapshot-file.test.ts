import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { z } from 'zod';
import { SnapshotFile } from './snapshot-file.js';

const Schema = z.object({ count: z.number() });

describe('SnapshotFile', () => {
  let dir: string;
  let file: SnapshotFile<z.infer<typeof Schema>>;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'snapshot-'));
    file = new SnapshotFile(path.join(dir, 'nested', 'state.json'), Schema, pino({ level: 'silent' }));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should report a missing file', async () => {
    expect(await file.load()).toEqual({ status: 'missing' });
  });

  it('should save and load a document, creating parent directories', async () => {
    expect(await file.save({ count: 3 })).toBe(true);

    expect(await file.load()).toEqual({ status: 'loaded', data: { count: 3 } });
    expect(await readdir(path.join(dir, 'nested'))).toEqual(['state.json']);
  });

  it('should keep the last of several overlapping saves', async () => {
    await Promise.all([file.save({ count: 1 }), file.save({ count: 2 }), file.save({ count: 3 })]);

    const text = await readFile(file.filePath, 'utf8');
    expect(JSON.parse(text)).toEqual({ count: 3 });
  });

  it('should report a failed write and leave no temp file behind', async () => {
    // A non-empty directory at the target path makes the final rename fail
    await mkdir(path.join(file.filePath, 'occupied'), { recursive: true });

    expect(await file.save({ count: 1 })).toBe(false);

    expect(await readdir(path.join(dir, 'nested'))).toEqual(['state.json']);
  });

  it('should flag malformed JSON as invalid', async () => {
    await file.save({ count: 1 });
    await writeFile(file.filePath, '{not json', 'utf8');

    const result = await file.load();
    expect(result.status).toBe('invalid');
  });

  it('should flag a schema mismatch as invalid with the failing path', async () => {
    await file.save({ count: 1 });
    await writeFile(file.filePath, JSON.stringify({ count: 'many' }), 'utf8');

    const result = await file.load();
    expect(result.status).toBe('invalid');
    if (result.status === 'invalid') {
      expect(result.reason).toMatch(/^count /);
    }
  });
});
