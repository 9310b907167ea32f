import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { Logger } from '../logger.js';

export type SnapshotLoad<T> =
  | { status: 'loaded'; data: T }
  | { status: 'missing' }
  | { status: 'invalid'; reason: string };

/** Outcome of a mutation whose state lives in memory and in a snapshot file. */
export interface Persisted<T> {
  value: T;
  persisted: boolean;
}

/**
 * A JSON document rewritten wholesale on every save.
 *
 * Writes go to a sibling temp file and are renamed into place, and are
 * chained so two saves never interleave. A save that fails leaves the
 * previous file intact and resolves to `false`.
 */
export class SnapshotFile<T> {
  private writeChain: Promise<unknown> = Promise.resolve();
  private writeSeq = 0;

  constructor(
    readonly filePath: string,
    private schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private log: Logger,
  ) {}

  async load(): Promise<SnapshotLoad<T>> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrno(error) && error.code === 'ENOENT') return { status: 'missing' };
      return { status: 'invalid', reason: error instanceof Error ? error.message : String(error) };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return { status: 'invalid', reason: `malformed JSON: ${error instanceof Error ? error.message : String(error)}` };
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      return { status: 'invalid', reason: first ? `${first.path.join('.') || '/'} ${first.message}` : 'schema mismatch' };
    }
    return { status: 'loaded', data: parsed.data };
  }

  save(data: T): Promise<boolean> {
    // Serialise now so later mutations of `data` cannot leak into this write
    const body = JSON.stringify(data, null, 2);
    const next = this.writeChain.then(() => this.write(body));
    this.writeChain = next;
    return next;
  }

  private async write(body: string): Promise<boolean> {
    const tmp = `${this.filePath}.${process.pid}.${++this.writeSeq}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tmp, body, 'utf8');
      await rename(tmp, this.filePath);
      return true;
    } catch (error) {
      this.log.error({ err: error, file: this.filePath }, 'failed to persist snapshot');
      await rm(tmp, { force: true }).catch((cleanupError: unknown) => {
        this.log.warn({ err: cleanupError, file: tmp }, 'failed to remove temp snapshot');
      });
      return false;
    }
  }
}

export function isErrno(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
