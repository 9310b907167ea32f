import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { InMemoryTaskRepository } from '../repositories/memory.js';
import { CacheIndex } from '../storage/cache-index.js';
import { StorageLifecycle } from '../storage/lifecycle.js';
import { taskData } from '../test-support/task-repository-contract.js';
import { DownloadResult, TransformRequest, VideoDownloader, VideoTransformer } from '../types/collaborators.js';
import { processingProgress, TaskCoordinator, CoordinatorConfig, UsageRecorder } from './index.js';

const log = pino({ level: 'silent' });

describe('processingProgress', () => {
  it('should map transformer progress onto 50..90', () => {
    expect(processingProgress(0, 4)).toBe(50);
    expect(processingProgress(1, 4)).toBe(60);
    expect(processingProgress(1, 3)).toBe(63);
    expect(processingProgress(4, 4)).toBe(90);
    expect(processingProgress(9, 4)).toBe(90);
  });

  it('should ignore a non-positive total', () => {
    expect(processingProgress(1, 0)).toBeNull();
    expect(processingProgress(1, -5)).toBeNull();
  });
});

describe('TaskCoordinator', () => {
  let root: string;
  let repo: InMemoryTaskRepository;
  let cache: CacheIndex;
  let lifecycle: StorageLifecycle;
  let ledger: { recordTask: Mock<UsageRecorder['recordTask']> };
  let download: () => Promise<DownloadResult>;
  let downloadCalls: number;
  let transform: (request: TransformRequest) => Promise<string>;
  let coordinator: TaskCoordinator;

  const transformer: VideoTransformer = {
    process: (request) => transform(request),
  };
  const downloader: VideoDownloader = {
    async download() {
      downloadCalls++;
      return download();
    },
    async getVideoInfo() {
      return null;
    },
  };

  function build(overrides: Partial<CoordinatorConfig> = {}) {
    coordinator = new TaskCoordinator(
      { tasks: repo, ledger, cache, layout: lifecycle, downloader, transformer, log },
      { maxConcurrent: 2, cacheEnabled: true, defaultFormat: '720p', modelHint: 'base', ...overrides }
    );
    return coordinator;
  }

  function downloadsTo(fileName: string, withSubtitle = false): () => Promise<DownloadResult> {
    return async () => {
      const filePath = path.join(lifecycle.cacheDir, fileName);
      await writeFile(filePath, Buffer.alloc(64));
      let subtitlePath: string | null = null;
      if (withSubtitle) {
        subtitlePath = path.join(lifecycle.cacheDir, `${fileName}.en.srt`);
        await writeFile(subtitlePath, '1\n00:00:00,000 --> 00:00:01,000\nHello\n');
      }
      return { success: true, filePath, subtitlePath };
    };
  }

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'coordinator-'));
    repo = new InMemoryTaskRepository();
    cache = await CacheIndex.open({ dataDir: root, log });
    lifecycle = await StorageLifecycle.open({ storageDir: path.join(root, 'storage'), quotaBytes: 0, cacheHours: 24, cache, log });
    ledger = { recordTask: vi.fn<UsageRecorder['recordTask']>(async () => ({ persisted: true })) };
    download = downloadsTo('vid-1_720p.mp4');
    downloadCalls = 0;
    transform = async (request) => {
      await writeFile(request.outputPath, 'rendered');
      return request.outputPath;
    };
  });

  afterEach(async () => {
    await coordinator?.stop();
    await rm(root, { recursive: true, force: true });
  });

  function useDownload(fn: () => Promise<DownloadResult>) {
    download = fn;
  }

  it('should mark the task failed when the download fails', async () => {
    useDownload(async () => ({ success: false, error: 'network timeout' }));
    build();
    const task = await repo.create(taskData());

    coordinator.submit(task.id);
    await coordinator.idle();

    const stored = await repo.get(task.id);
    expect(stored).toMatchObject({
      status: 'failed',
      errorMessage: 'network timeout',
      progress: 10,
      outputFile: null,
    });
    expect(stored?.completedAt).toBeInstanceOf(Date);
    expect(ledger.recordTask).not.toHaveBeenCalled();
  });

  it('should complete the task and record usage once', async () => {
    build();
    const task = await repo.create(taskData({ metadata: { format: '480p' } }));
    const seen: number[] = [];
    transform = async (request) => {
      request.onProgress?.(1, 4);
      request.onProgress?.(2, 4);
      request.onProgress?.(4, 4);
      await writeFile(request.outputPath, 'rendered');
      return request.outputPath;
    };
    const transition = repo.transition.bind(repo);
    vi.spyOn(repo, 'transition').mockImplementation(async (id, expected, update) => {
      if (update.progress !== undefined) seen.push(update.progress);
      return transition(id, expected, update);
    });

    coordinator.submit(task.id);
    await coordinator.idle();

    const stored = await repo.get(task.id);
    const output = lifecycle.outputPathFor(task.id);
    expect(stored).toMatchObject({
      status: 'completed',
      progress: 100,
      outputFile: output,
      errorMessage: null,
      metadata: { format: '480p', cacheHit: false },
    });
    expect(seen).toEqual([10, 40, 50, 60, 70, 90, 100]);
    expect(ledger.recordTask).toHaveBeenCalledTimes(1);
    expect(ledger.recordTask).toHaveBeenCalledWith('u1', 8);
    expect(cache.get('cnn10_vid-1_480p')).not.toBeNull();
  });

  it('should keep a completed task when its usage could not be saved', async () => {
    ledger.recordTask.mockResolvedValue({ persisted: false });
    build();
    const task = await repo.create(taskData());

    coordinator.submit(task.id);
    await coordinator.idle();

    expect((await repo.get(task.id))?.status).toBe('completed');
    expect(coordinator.getStats().completed).toBe(1);
  });

  it('should reuse a cached download for the same video and format', async () => {
    build();
    const first = await repo.create(taskData());
    coordinator.submit(first.id);
    await coordinator.idle();

    const second = await repo.create(taskData());
    coordinator.submit(second.id);
    await coordinator.idle();

    expect(downloadCalls).toBe(1);
    expect((await repo.get(second.id))?.metadata).toMatchObject({ cacheHit: true });
    expect(existsSync(path.join(lifecycle.cacheDir, 'vid-1_720p.mp4'))).toBe(true);
  });

  it('should delete an uncached download once the output exists', async () => {
    build({ cacheEnabled: false });
    const task = await repo.create(taskData());

    coordinator.submit(task.id);
    await coordinator.idle();

    expect((await repo.get(task.id))?.status).toBe('completed');
    expect(existsSync(path.join(lifecycle.cacheDir, 'vid-1_720p.mp4'))).toBe(false);
    expect(cache.size).toBe(0);
  });

  it('should keep the subtitle beside the output', async () => {
    useDownload(downloadsTo('vid-1_720p.mp4', true));
    build();
    const task = await repo.create(taskData());

    coordinator.submit(task.id);
    await coordinator.idle();

    const stored = await repo.get(task.id);
    expect(stored?.subtitleFile).toBe(lifecycle.subtitlePathFor(task.id));
    expect(existsSync(lifecycle.subtitlePathFor(task.id))).toBe(true);
  });

  it('should pin the cache entry only while the task runs', async () => {
    build();
    const task = await repo.create(taskData());
    let pinnedDuringRun = false;
    transform = async (request) => {
      pinnedDuringRun = cache.isPinned('cnn10_vid-1_720p');
      await writeFile(request.outputPath, 'rendered');
      return request.outputPath;
    };

    coordinator.submit(task.id);
    await coordinator.idle();

    expect(pinnedDuringRun).toBe(true);
    expect(cache.isPinned('cnn10_vid-1_720p')).toBe(false);
  });

  it('should not overwrite a task cancelled while processing', async () => {
    build();
    const task = await repo.create(taskData());
    transform = async (request) => {
      await repo.updatePartial(task.id, { status: 'cancelled' });
      await writeFile(request.outputPath, 'rendered');
      return request.outputPath;
    };

    coordinator.submit(task.id);
    await coordinator.idle();

    const stored = await repo.get(task.id);
    expect(stored?.status).toBe('cancelled');
    expect(stored?.outputFile).toBeNull();
    expect(existsSync(lifecycle.outputPathFor(task.id))).toBe(false);
    expect(ledger.recordTask).not.toHaveBeenCalled();
    expect(coordinator.getStats().superseded).toBe(1);
  });

  it('should fail the task when processing throws and not consume quota', async () => {
    build();
    const task = await repo.create(taskData());
    transform = async () => {
      throw new Error('ffmpeg exited with code 1');
    };

    coordinator.submit(task.id);
    await coordinator.idle();

    expect(await repo.get(task.id)).toMatchObject({
      status: 'failed',
      errorMessage: 'ffmpeg exited with code 1',
      progress: 50,
      outputFile: null,
    });
    expect(ledger.recordTask).not.toHaveBeenCalled();
    expect(coordinator.getStats().failed).toBe(1);
  });

  it('should skip a task that is no longer pending', async () => {
    build();
    const task = await repo.create(taskData());
    await repo.updatePartial(task.id, { status: 'cancelled' });

    coordinator.submit(task.id);
    await coordinator.idle();

    expect(downloadCalls).toBe(0);
    expect((await repo.get(task.id))?.status).toBe('cancelled');
  });

  it('should never run more pipelines than its capacity', async () => {
    build({ maxConcurrent: 1, cacheEnabled: false });
    let running = 0;
    let peak = 0;
    let n = 0;
    useDownload(async () => downloadsTo(`vid-${++n}.mp4`)());
    transform = async (request) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise(resolve => setTimeout(resolve, 5));
      await writeFile(request.outputPath, 'rendered');
      running--;
      return request.outputPath;
    };
    const ids: string[] = [];
    for (let i = 0; i < 3; i++) {
      ids.push((await repo.create(taskData({ videoId: `v${i}` }))).id);
    }

    for (const id of ids) coordinator.submit(id);
    await coordinator.idle();

    expect(peak).toBe(1);
    expect(await repo.countByStatus(['completed'])).toBe(3);
  });

  it('should refuse new work after stop', async () => {
    build();
    await coordinator.stop();

    expect(coordinator.submit('anything')).toBe(false);
  });
});
