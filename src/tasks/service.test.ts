import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { QuotaLedger } from '../quota/ledger.js';
import { TierConfigProvider } from '../quota/tier-config.js';
import { InMemoryTaskRepository } from '../repositories/memory.js';
import { TaskStatus } from '../types/task.js';
import { taskData } from '../test-support/task-repository-contract.js';
import { VideoInfo } from '../types/collaborators.js';
import { CreateTaskInput, INTERRUPTED_MESSAGE, TaskService, TaskSubmitter } from './service.js';

const log = pino({ level: 'silent' });

/** Answers the second store-wide count with the value read when it was sent, once `release` is called. */
class LaggingCountRepository extends InMemoryTaskRepository {
  private storeWideCounts = 0;
  private opened: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.opened = resolve;
  });

  release(): void {
    this.opened();
  }

  override async countByStatus(statuses: readonly TaskStatus[], userId?: string): Promise<number> {
    const count = await super.countByStatus(statuses, userId);
    if (!userId && ++this.storeWideCounts === 2) {
      await this.gate;
    }
    return count;
  }
}

const INFO: VideoInfo = {
  id: 'abc123',
  title: 'Ten minute news',
  duration: 600,
  thumbnail: null,
  uploadDate: '20240301',
};

function input(overrides: Partial<CreateTaskInput> = {}): CreateTaskInput {
  return {
    userId: 'u1',
    sourceId: 'cnn10',
    videoUrl: 'https://videos.example.test/watch?v=abc123',
    processingMode: 'with_subtitle',
    videoFormat: '480p',
    ...overrides,
  };
}

describe('TaskService', () => {
  let dir: string;
  let repo: InMemoryTaskRepository;
  let ledger: QuotaLedger;
  let submit: Mock<TaskSubmitter['submit']>;
  let getVideoInfo: Mock<(url: string) => Promise<VideoInfo | null>>;
  let service: TaskService;

  function build(options: { maxConcurrent?: number; now?: () => Date } = {}) {
    service = new TaskService(
      {
        tasks: repo,
        ledger,
        sources: { usableSource: (id) => (id === 'cnn10' ? { id } : null) },
        downloader: { getVideoInfo },
        coordinator: { submit },
        log,
        now: options.now,
      },
      { maxConcurrent: options.maxConcurrent ?? 2, queueDepthMultiplier: 2, defaultFormat: '720p' }
    );
    return service;
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'task-service-'));
    repo = new InMemoryTaskRepository();
    ledger = await QuotaLedger.open({ dataDir: dir, tiers: new TierConfigProvider(path.join(dir, 'tiers.json'), log), log });
    submit = vi.fn<TaskSubmitter['submit']>(() => true);
    getVideoInfo = vi.fn<(url: string) => Promise<VideoInfo | null>>(async () => INFO);
    build();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('createTask', () => {
    it('should create a pending task from the video info and queue it', async () => {
      const result = await service.createTask(input());

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toMatchObject({
        userId: 'u1',
        sourceId: 'cnn10',
        videoId: 'abc123',
        videoTitle: 'Ten minute news',
        status: 'pending',
        progress: 0,
        metadata: { format: '480p', duration: 600 },
      });
      expect(submit).toHaveBeenCalledWith(result.value.id, 1);
    });

    it('should cap an omitted format at the tier maximum', async () => {
      const result = await service.createTask(input({ videoFormat: undefined }));

      expect(result.ok ? result.value.metadata : null).toEqual({ format: '480p', duration: 600 });
    });

    it('should use the configured default format when the tier allows it', async () => {
      await ledger.setTier('u1', 'basic');

      const result = await service.createTask(input({ videoFormat: undefined }));

      expect(result.ok ? result.value.metadata.format : null).toBe('720p');
    });

    it('should refuse two concurrent creations at the soft cap without creating records', async () => {
      build({ maxConcurrent: 1 });
      await repo.create(taskData({ userId: 'a' }));
      await repo.create(taskData({ userId: 'b' }));

      const results = await Promise.all([service.createTask(input({ userId: 'c' })), service.createTask(input({ userId: 'd' }))]);

      expect(results.map(r => (r.ok ? 'ok' : r.error.type))).toEqual(['RETRY_LATER', 'RETRY_LATER']);
      expect(await repo.countByStatus(['pending'])).toBe(2);
      expect(getVideoInfo).not.toHaveBeenCalled();
    });

    it('should admit only one of two concurrent creations for the last slot', async () => {
      build({ maxConcurrent: 1 });
      await repo.create(taskData({ userId: 'a' }));

      const results = await Promise.all([service.createTask(input({ userId: 'c' })), service.createTask(input({ userId: 'd' }))]);

      expect(results.filter(r => r.ok)).toHaveLength(1);
      expect(results.filter(r => !r.ok && r.error.type === 'RETRY_LATER')).toHaveLength(1);
      expect(await service.countActiveTasks()).toBe(2);
    });

    it('should count an admitted task against a count sent before it was stored', async () => {
      const lagging = new LaggingCountRepository();
      repo = lagging;
      build({ maxConcurrent: 1 });
      await repo.create(taskData({ userId: 'a' }));

      const first = service.createTask(input({ userId: 'c' }));
      const second = service.createTask(input({ userId: 'd' }));
      expect((await first).ok).toBe(true);
      lagging.release();
      const late = await second;

      expect(late.ok ? 'ok' : late.error.type).toBe('RETRY_LATER');
      expect(await service.countActiveTasks()).toBe(2);
    });

    it('should reject an unknown source', async () => {
      const result = await service.createTask(input({ sourceId: 'nowhere' }));

      expect(result).toEqual({ ok: false, error: { type: 'BAD_INPUT', message: "Unknown or disabled source 'nowhere'", fields: undefined } });
    });

    it('should reject an unknown format', async () => {
      const result = await service.createTask(input({ videoFormat: '4k' }));

      expect(result.ok ? null : result.error.message).toBe("Unknown video format '4k'");
    });

    it('should reject a mode the tier does not allow', async () => {
      const result = await service.createTask(input({ processingMode: 'slow' }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.type).toBe('QUOTA_EXCEEDED');
      expect(result.error.message).toBe("Processing mode 'slow' not available for free tier. Upgrade to access this feature.");
      expect(result.error.fields).toEqual({ tier: 'free', remainingToday: 3 });
    });

    it('should reject a resolution above the tier maximum', async () => {
      const result = await service.createTask(input({ videoFormat: '1080p' }));

      expect(result.ok ? null : result.error.message).toBe(
        "Resolution '1080p' not available for free tier. Max: 480p. Upgrade for higher quality."
      );
    });

    it('should enforce the per-user concurrent task limit', async () => {
      await repo.create(taskData({ userId: 'u1' }));

      const result = await service.createTask(input());

      expect(result.ok ? null : result.error.message).toBe('Concurrent task limit reached (1 for free tier). Wait for a task to finish.');
    });

    it('should count queued tasks against the remaining daily quota', async () => {
      await ledger.setTier('u1', 'basic');
      for (let i = 0; i < 14; i++) await ledger.recordTask('u1', 0);
      await repo.create(taskData({ userId: 'u1' }));

      const result = await service.createTask(input({ processingMode: 'repeat_twice', videoFormat: '720p' }));

      expect(result.ok ? null : result.error.message).toBe('Daily limit would be exceeded by tasks already queued (1 remaining today).');
    });

    it('should reject a url without video information', async () => {
      getVideoInfo.mockResolvedValue(null);

      const result = await service.createTask(input());

      expect(result.ok ? null : result.error).toMatchObject({
        type: 'BAD_INPUT',
        message: 'Could not get video information. Please check the URL.',
      });
      expect(await repo.countByStatus(['pending'])).toBe(0);
    });

    it('should fail the record when the coordinator no longer accepts work', async () => {
      submit.mockReturnValue(false);

      const result = await service.createTask(input());

      expect(result.ok ? null : result.error.type).toBe('RETRY_LATER');
      const [task] = await repo.findByUser('u1');
      expect(task?.status).toBe('failed');
      expect(task?.errorMessage).toBe('Service is shutting down. Please try again shortly.');
    });
  });

  describe('listUserTasks', () => {
    it('should list the newest tasks first', async () => {
      const older = await repo.create(taskData());
      const newer = await repo.create(taskData());
      await repo.create(taskData({ userId: 'u2' }));

      expect((await service.listUserTasks('u1')).map(t => t.id)).toEqual([newer.id, older.id]);
      expect((await service.listUserTasks('u1', undefined, 1)).map(t => t.id)).toEqual([newer.id]);
    });
  });

  describe('updateTask', () => {
    it('should change only the progress', async () => {
      const task = await repo.create(taskData());

      const updated = await service.updateTask(task.id, { progress: 55 });

      expect(updated).toMatchObject({ ...task, progress: 55, updatedAt: expect.any(Date) });
    });
  });

  describe('cancelTask', () => {
    it('should cancel an active task', async () => {
      const task = await repo.create(taskData());

      const result = await service.cancelTask(task.id);

      expect(result.kind).toBe('updated');
      expect((await repo.get(task.id))?.completedAt).toBeInstanceOf(Date);
    });

    it('should report a conflict for a finished task', async () => {
      const task = await repo.create(taskData());
      await repo.updatePartial(task.id, { status: 'failed', errorMessage: 'boom' });

      const result = await service.cancelTask(task.id);

      expect(result.kind).toBe('conflict');
      expect((await repo.get(task.id))?.status).toBe('failed');
    });
  });

  describe('deleteTask', () => {
    it('should remove the record and its files', async () => {
      const output = path.join(dir, 'out.mp4');
      const subtitle = path.join(dir, 'out.srt');
      await writeFile(output, 'video');
      await writeFile(subtitle, 'subs');
      const task = await repo.create(taskData());
      await repo.updatePartial(task.id, { status: 'downloading' });
      await repo.updatePartial(task.id, { status: 'processing' });
      await repo.updatePartial(task.id, { status: 'completed', outputFile: output, subtitleFile: subtitle });

      expect(await service.deleteTask(task.id)).toBe(true);

      expect(await repo.get(task.id)).toBeNull();
      expect(existsSync(output)).toBe(false);
      expect(existsSync(subtitle)).toBe(false);
    });

    it('should ignore files that are already gone', async () => {
      const task = await repo.create(taskData());
      await repo.updatePartial(task.id, { status: 'failed', outputFile: path.join(dir, 'missing.mp4') });

      expect(await service.deleteTask(task.id)).toBe(true);
    });

    it('should return false for a missing task', async () => {
      expect(await service.deleteTask('missing')).toBe(false);
    });
  });

  describe('cleanupOlderThan', () => {
    it('should delete completed and failed tasks past retention', async () => {
      build({ now: () => new Date(Date.now() + 2 * 3_600_000) });
      const done = await repo.create(taskData());
      const failed = await repo.create(taskData());
      const cancelled = await repo.create(taskData());
      const active = await repo.create(taskData());
      await repo.updatePartial(done.id, { status: 'downloading' });
      await repo.updatePartial(done.id, { status: 'processing' });
      await repo.updatePartial(done.id, { status: 'completed' });
      await repo.updatePartial(failed.id, { status: 'failed' });
      await repo.updatePartial(cancelled.id, { status: 'cancelled' });

      expect(await service.cleanupOlderThan(3_600_000)).toBe(2);

      expect(await repo.get(done.id)).toBeNull();
      expect(await repo.get(failed.id)).toBeNull();
      expect(await repo.get(cancelled.id)).not.toBeNull();
      expect(await repo.get(active.id)).not.toBeNull();
    });

    it('should keep tasks inside the retention window', async () => {
      const task = await repo.create(taskData());
      await repo.updatePartial(task.id, { status: 'failed' });

      expect(await service.cleanupOlderThan(3_600_000)).toBe(0);
    });
  });

  describe('recoverInterrupted', () => {
    it('should fail half-run tasks and queue pending ones again', async () => {
      const downloading = await repo.create(taskData());
      const processing = await repo.create(taskData());
      const pending = await repo.create(taskData({ userId: 'u2' }));
      await repo.updatePartial(downloading.id, { status: 'downloading', progress: 10 });
      await repo.updatePartial(processing.id, { status: 'downloading' });
      await repo.updatePartial(processing.id, { status: 'processing', progress: 50 });

      const report = await service.recoverInterrupted();

      expect(report).toEqual({ failed: 2, resubmitted: 1 });
      expect(await repo.get(downloading.id)).toMatchObject({ status: 'failed', errorMessage: INTERRUPTED_MESSAGE, progress: 10 });
      expect(await repo.get(processing.id)).toMatchObject({ status: 'failed', errorMessage: INTERRUPTED_MESSAGE });
      expect(submit).toHaveBeenCalledTimes(1);
      expect(submit).toHaveBeenCalledWith(pending.id, 1);
    });
  });
});
