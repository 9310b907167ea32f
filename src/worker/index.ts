import { copyFile } from 'node:fs/promises';
import { errorMessage } from '../errors.js';
import { Logger } from '../logger.js';
import { TaskRepository } from '../repositories/base.js';
import { CacheIndex, cacheKey } from '../storage/cache-index.js';
import { RemoteSync } from '../storage/remote-sync.js';
import { VideoDownloader, VideoTransformer } from '../types/collaborators.js';
import { Task, TaskStatus, TaskUpdate } from '../types/task.js';
import { fileSize, removeFile } from '../util/files.js';
import { Semaphore } from './semaphore.js';

export const PROGRESS = {
  downloading: 10,
  downloaded: 40,
  processing: 50,
  processingCeiling: 90,
  completed: 100,
} as const;

/** Maps transformer progress onto the 50..90 band. Null when `total` is not positive. */
export function processingProgress(current: number, total: number): number | null {
  if (total <= 0) return null;
  const span = PROGRESS.processingCeiling - PROGRESS.processing;
  return Math.min(PROGRESS.processing + Math.floor((current / total) * span), PROGRESS.processingCeiling);
}

export interface UsageRecorder {
  recordTask(userId: string, bytesProcessed: number): Promise<{ persisted: boolean }>;
}

export interface OutputLayout {
  outputPathFor(taskId: string): string;
  subtitlePathFor(taskId: string): string;
}

export interface CoordinatorConfig {
  maxConcurrent: number;
  cacheEnabled: boolean;
  defaultFormat: string;
  modelHint: string;
}

export interface CoordinatorDeps {
  tasks: TaskRepository;
  ledger: UsageRecorder;
  cache: CacheIndex;
  layout: OutputLayout;
  downloader: VideoDownloader;
  transformer: VideoTransformer;
  remote?: RemoteSync | null;
  log: Logger;
}

export interface CoordinatorStats {
  running: number;
  queued: number;
  completed: number;
  failed: number;
  superseded: number;
}

interface SourceMedia {
  filePath: string;
  subtitlePath: string | null;
  cacheHit: boolean;
  cached: boolean;
}

/**
 * Runs task pipelines on a bounded pool. Every status write is conditional
 * on the state this pipeline expects; if someone else concluded the task
 * (a cancellation, say) the pipeline stops without writing.
 */
export class TaskCoordinator {
  private semaphore: Semaphore;
  private inflight = new Set<Promise<void>>();
  private stopping = false;
  private log: Logger;
  private stats = { completed: 0, failed: 0, superseded: 0 };

  constructor(private deps: CoordinatorDeps, private config: CoordinatorConfig) {
    this.semaphore = new Semaphore(config.maxConcurrent);
    this.log = deps.log.child({ component: 'coordinator' });
  }

  /** Queues a task and returns at once. False after `stop()`. */
  submit(taskId: string, priority = 0): boolean {
    if (this.stopping) {
      this.log.warn({ taskId }, 'coordinator stopping, task not accepted');
      return false;
    }

    const run = this.semaphore
      .acquire(priority)
      .then((release) => this.runTask(taskId).finally(release))
      .catch((error: unknown) => {
        this.log.error({ taskId, err: errorMessage(error) }, 'task run aborted');
      });
    this.inflight.add(run);
    void run.finally(() => this.inflight.delete(run));
    return true;
  }

  /** Resolves once nothing is queued or running. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(this.inflight);
    }
  }

  async stop(): Promise<void> {
    this.stopping = true;
    await this.idle();
  }

  getStats(): CoordinatorStats {
    return {
      running: this.semaphore.active,
      queued: this.semaphore.waiting,
      ...this.stats,
    };
  }

  private async runTask(taskId: string): Promise<void> {
    const log = this.log.child({ taskId });
    let pinnedKey: string | null = null;

    try {
      const started = await this.deps.tasks.transition(taskId, ['pending'], {
        status: 'downloading',
        progress: PROGRESS.downloading,
      });
      if (started.kind !== 'updated') {
        log.info({ outcome: started.kind }, 'task no longer pending, skipped');
        this.stats.superseded++;
        return;
      }
      const task = started.task;
      const format = typeof task.metadata.format === 'string' ? task.metadata.format : this.config.defaultFormat;

      // Pinned before the lookup so a sweep cannot evict the entry in between
      if (this.config.cacheEnabled) {
        pinnedKey = cacheKey(task.videoId, task.sourceId, format);
        this.deps.cache.pin(pinnedKey);
      }

      const source = await this.fetchSource(task, format, log);
      if ('error' in source) {
        await this.fail(taskId, ['downloading'], source.error, log);
        return;
      }

      const proceed =
        (await this.advance(taskId, ['downloading'], { progress: PROGRESS.downloaded, metadata: { cacheHit: source.cacheHit } }, log)) &&
        (await this.advance(taskId, ['downloading'], { status: 'processing', progress: PROGRESS.processing }, log));
      if (!proceed) {
        await this.discardSource(source, null);
        return;
      }

      await this.process(task, source, log);
    } catch (error) {
      log.error({ err: errorMessage(error) }, 'unexpected pipeline error');
      await this.fail(taskId, ['pending', 'downloading', 'processing'], errorMessage(error), log);
    } finally {
      if (pinnedKey) this.deps.cache.unpin(pinnedKey);
    }
  }

  private async fetchSource(task: Task, format: string, log: Logger): Promise<SourceMedia | { error: string }> {
    const { cache } = this.deps;

    if (this.config.cacheEnabled) {
      const hit = await cache.lookup(task.videoId, task.sourceId, format);
      if (hit) {
        log.info({ key: hit.key }, 'using cached source');
        return { filePath: hit.filePath, subtitlePath: hit.subtitlePath, cacheHit: true, cached: true };
      }
    }

    const result = await this.deps.downloader.download(task.videoUrl, { formatId: format });
    if (!result.success) {
      return { error: result.error };
    }

    if (this.config.cacheEnabled) {
      const inserted = await cache.insert(
        task.videoId,
        task.sourceId,
        format,
        result.filePath,
        result.subtitlePath !== null,
        result.subtitlePath
      );
      if (!inserted.persisted) {
        log.warn({ key: inserted.value.key }, 'cache entry kept in memory only');
      }
      return { filePath: result.filePath, subtitlePath: result.subtitlePath, cacheHit: false, cached: true };
    }
    return { filePath: result.filePath, subtitlePath: result.subtitlePath, cacheHit: false, cached: false };
  }

  private async process(task: Task, source: SourceMedia, log: Logger): Promise<void> {
    const outputPath = this.deps.layout.outputPathFor(task.id);

    // Progress writes are chained so they land in order and can be drained
    let lastProgress: number = PROGRESS.processing;
    let progressChain: Promise<void> = Promise.resolve();
    const onProgress = (current: number, total: number) => {
      const progress = processingProgress(current, total);
      if (progress === null || progress <= lastProgress) return;
      lastProgress = progress;
      progressChain = progressChain
        .then(() => this.deps.tasks.transition(task.id, ['processing'], { progress }))
        .then(
          () => undefined,
          (error: unknown) => log.warn({ err: errorMessage(error) }, 'progress update failed')
        );
    };

    let output: string;
    try {
      output = await this.deps.transformer.process({
        inputPath: source.filePath,
        outputPath,
        mode: task.processingMode,
        sourceUrl: task.videoUrl,
        subtitlePath: source.subtitlePath,
        modelHint: this.config.modelHint,
        onProgress,
      });
    } catch (error) {
      await progressChain;
      await this.fail(task.id, ['processing'], errorMessage(error), log);
      await removeFile(outputPath);
      await this.discardSource(source, outputPath);
      return;
    }
    await progressChain;

    const subtitleFile = await this.keepSubtitle(task.id, source, log);
    await this.discardSource(source, output);

    const outputSize = (await fileSize(output)) ?? 0;
    const done = await this.deps.tasks.transition(task.id, ['processing'], {
      status: 'completed',
      progress: PROGRESS.completed,
      outputFile: output,
      subtitleFile,
    });
    if (done.kind !== 'updated') {
      log.info({ outcome: done.kind }, 'task concluded elsewhere, discarding output');
      this.stats.superseded++;
      await removeFile(output);
      if (subtitleFile) await removeFile(subtitleFile);
      return;
    }

    const usage = await this.deps.ledger.recordTask(task.userId, outputSize);
    if (!usage.persisted) {
      log.error({ userId: task.userId }, 'quota usage recorded in memory only');
    }
    this.stats.completed++;
    log.info({ output, bytes: outputSize, cacheHit: source.cacheHit }, 'task completed');

    const remote = this.deps.remote;
    if (remote?.enabled) {
      const remotePath = await remote.syncToRemote(output);
      if (remotePath) {
        await this.deps.tasks.updatePartial(task.id, { metadata: { remotePath } });
      }
    }
  }

  /** Copies the source subtitle next to the output so it outlives the download. */
  private async keepSubtitle(taskId: string, source: SourceMedia, log: Logger): Promise<string | null> {
    if (!source.subtitlePath || (await fileSize(source.subtitlePath)) === null) return null;
    const target = this.deps.layout.subtitlePathFor(taskId);
    try {
      await copyFile(source.subtitlePath, target);
      return target;
    } catch (error) {
      log.warn({ err: errorMessage(error) }, 'could not keep subtitle');
      return null;
    }
  }

  /** Uncached downloads are single use. */
  private async discardSource(source: SourceMedia, output: string | null): Promise<void> {
    if (source.cached || source.filePath === output) return;
    await removeFile(source.filePath);
    if (source.subtitlePath) await removeFile(source.subtitlePath);
  }

  private async advance(
    taskId: string,
    expected: readonly TaskStatus[],
    update: TaskUpdate,
    log: Logger
  ): Promise<boolean> {
    const result = await this.deps.tasks.transition(taskId, expected, update);
    if (result.kind === 'updated') return true;
    log.info({ outcome: result.kind }, 'task concluded elsewhere, stopping');
    this.stats.superseded++;
    return false;
  }

  private async fail(taskId: string, expected: readonly TaskStatus[], message: string, log: Logger): Promise<void> {
    try {
      const result = await this.deps.tasks.transition(taskId, expected, { status: 'failed', errorMessage: message });
      if (result.kind === 'updated') {
        this.stats.failed++;
        log.warn({ err: message }, 'task failed');
      } else {
        this.stats.superseded++;
      }
    } catch (error) {
      log.error({ err: errorMessage(error) }, 'could not record task failure');
    }
  }
}
