import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import { errorMessage } from '../errors.js';
import { Logger } from '../logger.js';
import { CleanupResult, MaintenanceReport, StorageStats } from '../types/storage.js';
import { removeFile } from '../util/files.js';
import { CacheIndex } from './cache-index.js';
import { RemoteSync } from './remote-sync.js';

// Quota sweeps stop once usage is at or below this share of the quota
export const QUOTA_TARGET_RATIO = 0.8;

const HOUR_MS = 60 * 60 * 1000;

export interface StorageLifecycleOptions {
  storageDir: string;
  quotaBytes: number;
  cacheHours: number;
  cache: CacheIndex;
  remote?: RemoteSync;
  log: Logger;
  now?: () => Date;
}

interface ScannedFile {
  path: string;
  size: number;
  mtimeMs: number;
}

function emptyResult(): CleanupResult {
  return { filesRemoved: 0, bytesFreed: 0 };
}

/**
 * Keeps `<storage>/cache` and `<storage>/processed` inside the retention
 * window and the byte quota. Pinned cache entries are never touched.
 */
export class StorageLifecycle {
  readonly cacheDir: string;
  readonly processedDir: string;
  private log: Logger;
  private now: () => Date;

  constructor(private options: StorageLifecycleOptions) {
    this.cacheDir = path.join(options.storageDir, 'cache');
    this.processedDir = path.join(options.storageDir, 'processed');
    this.log = options.log.child({ component: 'storage' });
    this.now = options.now ?? (() => new Date());
  }

  static async open(options: StorageLifecycleOptions): Promise<StorageLifecycle> {
    const lifecycle = new StorageLifecycle(options);
    await mkdir(lifecycle.cacheDir, { recursive: true });
    await mkdir(lifecycle.processedDir, { recursive: true });
    lifecycle.log.info(
      { storageDir: options.storageDir, quotaBytes: options.quotaBytes, cacheHours: options.cacheHours },
      'storage initialised'
    );
    return lifecycle;
  }

  get quotaBytes(): number {
    return this.options.quotaBytes;
  }

  get remote(): RemoteSync | null {
    return this.options.remote ?? null;
  }

  outputPathFor(taskId: string): string {
    return path.join(this.processedDir, `${taskId}_processed.mp4`);
  }

  subtitlePathFor(taskId: string): string {
    return path.join(this.processedDir, `${taskId}_processed.srt`);
  }

  private async scan(pattern: string, dirs: string[]): Promise<ScannedFile[]> {
    const files: ScannedFile[] = [];
    for (const cwd of dirs) {
      const entries = await fg(pattern, { cwd, absolute: true, onlyFiles: true, dot: true, stats: true });
      for (const entry of entries) {
        if (!entry.stats) continue;
        files.push({ path: entry.path, size: entry.stats.size, mtimeMs: entry.stats.mtimeMs });
      }
    }
    return files;
  }

  async getStorageStats(): Promise<StorageStats> {
    const files = await this.scan('**/*', [this.cacheDir, this.processedDir]);

    let totalBytes = 0;
    let oldest: ScannedFile | null = null;
    let newest: ScannedFile | null = null;
    for (const file of files) {
      totalBytes += file.size;
      if (!oldest || file.mtimeMs < oldest.mtimeMs) oldest = file;
      if (!newest || file.mtimeMs > newest.mtimeMs) newest = file;
    }

    const quota = this.options.quotaBytes;
    return {
      totalBytes,
      fileCount: files.length,
      oldestFile: oldest ? oldest.path : null,
      newestFile: newest ? newest.path : null,
      quotaUsedPercent: quota > 0 ? (totalBytes / quota) * 100 : 0,
    };
  }

  /**
   * Evicts cache entries not accessed within `cacheHours`, then deletes
   * `*_processed.*` outputs older than the same cutoff.
   */
  async cleanupExpired(): Promise<CleanupResult> {
    const cutoff = this.now().getTime() - this.options.cacheHours * HOUR_MS;
    const result = emptyResult();
    const { cache } = this.options;

    for (const entry of cache.allEntries()) {
      if (Date.parse(entry.lastAccessedAt) >= cutoff || cache.isPinned(entry.key)) continue;
      try {
        const evicted = await cache.evict(entry.key);
        if (evicted) {
          result.filesRemoved += evicted.filesRemoved;
          result.bytesFreed += evicted.bytesFreed;
        }
      } catch (error) {
        this.log.warn({ key: entry.key, err: errorMessage(error) }, 'failed to evict expired entry');
      }
    }

    const outputs = await this.scan('*_processed.*', [this.processedDir]);
    for (const file of outputs) {
      if (file.mtimeMs >= cutoff) continue;
      try {
        const freed = await removeFile(file.path);
        if (freed !== null) {
          result.filesRemoved += 1;
          result.bytesFreed += freed;
          this.log.info({ file: file.path }, 'removed expired output');
        }
      } catch (error) {
        this.log.warn({ file: file.path, err: errorMessage(error) }, 'failed to remove expired output');
      }
    }

    if (result.filesRemoved > 0) {
      this.log.info(result, 'expired cleanup finished');
    }
    return result;
  }

  /** Least-recently-used eviction until usage drops to 80% of the quota. */
  async cleanupToQuota(): Promise<CleanupResult> {
    const result = emptyResult();
    const stats = await this.getStorageStats();
    if (stats.totalBytes <= this.options.quotaBytes) return result;

    const target = Math.floor(this.options.quotaBytes * QUOTA_TARGET_RATIO);
    const { cache } = this.options;
    const candidates = cache
      .allEntries()
      .sort((a, b) => Date.parse(a.lastAccessedAt) - Date.parse(b.lastAccessedAt));

    let current = stats.totalBytes;
    for (const entry of candidates) {
      if (current <= target) break;
      if (cache.isPinned(entry.key)) continue;
      try {
        const evicted = await cache.evict(entry.key);
        if (evicted) {
          current -= evicted.bytesFreed;
          result.filesRemoved += evicted.filesRemoved;
          result.bytesFreed += evicted.bytesFreed;
        }
      } catch (error) {
        this.log.warn({ key: entry.key, err: errorMessage(error) }, 'failed to evict entry for quota');
      }
    }

    if (current > target) {
      this.log.warn({ totalBytes: current, target }, 'quota target not reached with cache eviction alone');
    }
    if (result.filesRemoved > 0) {
      this.log.info(result, 'quota cleanup finished');
    }
    return result;
  }

  async runMaintenance(): Promise<MaintenanceReport> {
    const timestamp = this.now().toISOString();
    const storageBefore = await this.getStorageStats();
    const expiredCleanup = await this.cleanupExpired();
    const quotaCleanup = await this.cleanupToQuota();
    const storageAfter = await this.getStorageStats();

    const report: MaintenanceReport = { timestamp, expiredCleanup, quotaCleanup, storageBefore, storageAfter };
    this.log.info({ expiredCleanup, quotaCleanup, totalBytes: storageAfter.totalBytes }, 'maintenance complete');
    return report;
  }
}
