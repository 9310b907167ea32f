import path from 'node:path';
import { z } from 'zod';
import { Logger } from '../logger.js';
import { CachedArtifact, CleanupResult } from '../types/storage.js';
import { fileSize, removeFile } from '../util/files.js';
import { Persisted, SnapshotFile } from '../util/snapshot-file.js';

const CachedArtifactSchema = z.object({
  key: z.string(),
  videoId: z.string(),
  sourceId: z.string(),
  formatId: z.string(),
  filePath: z.string(),
  fileSize: z.number().min(0),
  createdAt: z.string(),
  lastAccessedAt: z.string(),
  accessCount: z.number().int().min(0),
  hasSubtitle: z.boolean().default(false),
  subtitlePath: z.string().nullable().default(null),
});

const CacheFileSchema = z.record(CachedArtifactSchema);

export interface CacheIndexOptions {
  dataDir: string;
  log: Logger;
  now?: () => Date;
}

/** Files removed by an eviction, and whether the index change reached disk. */
export interface Eviction extends CleanupResult {
  persisted: boolean;
}

export function cacheKey(videoId: string, sourceId: string, formatId: string): string {
  return `${sourceId}_${videoId}_${formatId}`;
}

/**
 * Index of downloaded source videos, keyed by source, video and format.
 * Persisted to `cache_index.json` after every change.
 *
 * Pins are in-memory reference counts held by running tasks; sweeps skip
 * pinned entries and `evict` refuses them.
 */
export class CacheIndex {
  private entries = new Map<string, CachedArtifact>();
  private pins = new Map<string, number>();
  private file: SnapshotFile<Record<string, CachedArtifact>>;
  private now: () => Date;
  private log: Logger;

  constructor(options: CacheIndexOptions) {
    this.log = options.log.child({ component: 'cache' });
    this.now = options.now ?? (() => new Date());
    this.file = new SnapshotFile(path.join(options.dataDir, 'cache_index.json'), CacheFileSchema, this.log);
  }

  static async open(options: CacheIndexOptions): Promise<CacheIndex> {
    const index = new CacheIndex(options);
    await index.load();
    return index;
  }

  async load(): Promise<void> {
    const loaded = await this.file.load();
    this.entries.clear();
    if (loaded.status === 'loaded') {
      for (const [key, entry] of Object.entries(loaded.data)) {
        this.entries.set(key, entry);
      }
    } else if (loaded.status === 'invalid') {
      this.log.warn({ reason: loaded.reason }, 'failed to load cache index, starting empty');
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Cache hit for the given video, or null. An entry whose file has gone
   * missing is dropped and reported as a miss.
   */
  async lookup(videoId: string, sourceId: string, formatId: string): Promise<CachedArtifact | null> {
    const key = cacheKey(videoId, sourceId, formatId);
    const entry = this.entries.get(key);
    if (!entry) return null;

    if ((await fileSize(entry.filePath)) === null) {
      this.entries.delete(key);
      await this.persist();
      this.log.warn({ key, file: entry.filePath }, 'cached file missing, entry dropped');
      return null;
    }

    const touched: CachedArtifact = {
      ...entry,
      lastAccessedAt: this.now().toISOString(),
      accessCount: entry.accessCount + 1,
    };
    this.entries.set(key, touched);
    await this.persist();
    this.log.debug({ key, accessCount: touched.accessCount }, 'cache hit');
    return { ...touched };
  }

  async insert(
    videoId: string,
    sourceId: string,
    formatId: string,
    filePath: string,
    hasSubtitle = false,
    subtitlePath: string | null = null,
  ): Promise<Persisted<CachedArtifact>> {
    const key = cacheKey(videoId, sourceId, formatId);
    const timestamp = this.now().toISOString();
    const entry: CachedArtifact = {
      key,
      videoId,
      sourceId,
      formatId,
      filePath,
      fileSize: (await fileSize(filePath)) ?? 0,
      createdAt: timestamp,
      lastAccessedAt: timestamp,
      accessCount: 1,
      hasSubtitle,
      subtitlePath,
    };

    this.entries.set(key, entry);
    const persisted = await this.persist();
    this.log.info({ key, bytes: entry.fileSize }, 'added to cache');
    return { value: { ...entry }, persisted };
  }

  allEntries(): CachedArtifact[] {
    return Array.from(this.entries.values(), entry => ({ ...entry }));
  }

  get(key: string): CachedArtifact | null {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : null;
  }

  /** True when some entry points at this file. */
  ownsFile(filePath: string): boolean {
    const resolved = path.resolve(filePath);
    for (const entry of this.entries.values()) {
      if (path.resolve(entry.filePath) === resolved) return true;
    }
    return false;
  }

  /** Drops the entry from the index. Files on disk are left alone. */
  async remove(key: string): Promise<Persisted<CachedArtifact> | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    this.entries.delete(key);
    return { value: entry, persisted: await this.persist() };
  }

  /**
   * Deletes the entry with its video and subtitle files. Null when there
   * is no such entry or it is pinned.
   */
  async evict(key: string): Promise<Eviction | null> {
    const entry = this.entries.get(key);
    if (!entry || this.isPinned(key)) return null;

    const result = { filesRemoved: 0, bytesFreed: 0 };
    for (const file of [entry.filePath, entry.subtitlePath]) {
      if (!file) continue;
      const freed = await removeFile(file);
      if (freed !== null) {
        result.filesRemoved += 1;
        result.bytesFreed += freed;
      }
    }
    this.entries.delete(key);
    const persisted = await this.persist();

    this.log.info({ key, bytes: result.bytesFreed }, 'evicted from cache');
    return { ...result, persisted };
  }

  pin(key: string): void {
    this.pins.set(key, (this.pins.get(key) ?? 0) + 1);
  }

  unpin(key: string): void {
    const count = this.pins.get(key) ?? 0;
    if (count <= 1) {
      this.pins.delete(key);
    } else {
      this.pins.set(key, count - 1);
    }
  }

  isPinned(key: string): boolean {
    return (this.pins.get(key) ?? 0) > 0;
  }

  private persist(): Promise<boolean> {
    return this.file.save(Object.fromEntries(this.entries));
  }
}
