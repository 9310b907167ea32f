import { errorMessage, fail, ok, Result } from '../errors.js';
import { fmt, msg } from '../lib/error-messages.js';
import { Logger } from '../logger.js';
import { QuotaLedger } from '../quota/ledger.js';
import { TaskRepository } from '../repositories/base.js';
import { findFormat } from '../storage/formats.js';
import { VideoDownloader } from '../types/collaborators.js';
import {
  ACTIVE_STATUSES,
  ProcessingMode,
  Task,
  TaskStatus,
  TaskUpdate,
  TransitionResult,
} from '../types/task.js';
import { removeFile } from '../util/files.js';

export const INTERRUPTED_MESSAGE = 'Interrupted by service restart';

export interface CreateTaskInput {
  userId: string;
  sourceId: string;
  videoUrl: string;
  processingMode: ProcessingMode;
  /** Omitted: the configured default, capped at the caller's tier. */
  videoFormat?: string;
}

export interface SourceLookup {
  usableSource(sourceId: string): { id: string } | null;
}

export interface TaskSubmitter {
  submit(taskId: string, priority?: number): boolean;
}

export interface TaskServiceDeps {
  tasks: TaskRepository;
  ledger: QuotaLedger;
  sources: SourceLookup;
  downloader: Pick<VideoDownloader, 'getVideoInfo'>;
  coordinator: TaskSubmitter;
  log: Logger;
  now?: () => Date;
}

export interface TaskServiceConfig {
  maxConcurrent: number;
  queueDepthMultiplier: number;
  defaultFormat: string;
}

export interface RecoveryReport {
  failed: number;
  resubmitted: number;
}

/**
 * Task lifecycle operations on top of the repository: admission, listing,
 * cancellation, deletion with file cleanup and retention.
 */
export class TaskService {
  // Admissions past the cap check whose record a count may not include yet
  private reserved = 0;
  private countsInFlight = 0;
  // Inserted records held in `reserved` until every count sent before the insert has returned
  private heldForCounts = 0;
  private log: Logger;
  private now: () => Date;

  constructor(private deps: TaskServiceDeps, private config: TaskServiceConfig) {
    this.log = deps.log.child({ component: 'tasks' });
    this.now = deps.now ?? (() => new Date());
  }

  get softCap(): number {
    return this.config.maxConcurrent * this.config.queueDepthMultiplier;
  }

  async createTask(input: CreateTaskInput): Promise<Result<Task>> {
    if (!(await this.reserveSlot())) {
      return fail('RETRY_LATER', msg('TOO_MANY_PENDING'));
    }

    let inserted = false;
    try {
      const result = await this.admit(input);
      inserted = result.ok;
      return result;
    } finally {
      if (inserted && this.countsInFlight > 0) {
        this.heldForCounts++;
      } else {
        this.reserved--;
      }
    }
  }

  private async reserveSlot(): Promise<boolean> {
    this.countsInFlight++;
    try {
      const active = await this.deps.tasks.countByStatus(ACTIVE_STATUSES);
      if (active + this.reserved >= this.softCap) {
        this.log.warn({ active, reserved: this.reserved, cap: this.softCap }, 'task admission refused, queue full');
        return false;
      }
      this.reserved++;
      return true;
    } finally {
      this.countsInFlight--;
      if (this.countsInFlight === 0) {
        this.reserved -= this.heldForCounts;
        this.heldForCounts = 0;
      }
    }
  }

  private async admit(input: CreateTaskInput): Promise<Result<Task>> {
    const { userId } = input;
    const videoFormat = input.videoFormat ?? this.deps.ledger.formatFor(userId, this.config.defaultFormat);

    if (!this.deps.sources.usableSource(input.sourceId)) {
      return fail('BAD_INPUT', fmt('UNKNOWN_SOURCE', { sourceId: input.sourceId }));
    }
    if (!findFormat(videoFormat)) {
      return fail('BAD_INPUT', fmt('UNKNOWN_FORMAT', { format: videoFormat }));
    }

    const quota = await this.deps.ledger.checkQuota(userId, input.processingMode, videoFormat);
    if (!quota.allowed) {
      return fail('QUOTA_EXCEEDED', quota.reason ?? msg('INTERNAL_UNEXPECTED'), {
        tier: quota.tier,
        remainingToday: quota.remainingToday,
      });
    }

    const userActive = await this.deps.tasks.countByStatus(ACTIVE_STATUSES, userId);
    if (userActive >= quota.limits.concurrentTasks) {
      return fail('QUOTA_EXCEEDED', fmt('QUOTA_CONCURRENT', { limit: quota.limits.concurrentTasks, tier: quota.tier }));
    }
    if (quota.remainingToday !== 'unlimited' && userActive >= quota.remainingToday) {
      return fail('QUOTA_EXCEEDED', fmt('QUOTA_QUEUED', { remaining: quota.remainingToday }));
    }

    const info = await this.deps.downloader.getVideoInfo(input.videoUrl);
    if (!info) {
      return fail('BAD_INPUT', msg('VIDEO_INFO_UNAVAILABLE'));
    }

    const task = await this.deps.tasks.create({
      userId,
      sourceId: input.sourceId,
      videoId: info.id,
      videoUrl: input.videoUrl,
      videoTitle: info.title,
      processingMode: input.processingMode,
      metadata: { format: videoFormat, duration: info.duration },
    });

    if (!this.deps.coordinator.submit(task.id, quota.limits.priority)) {
      await this.deps.tasks.transition(task.id, ['pending'], { status: 'failed', errorMessage: msg('SHUTTING_DOWN') });
      return fail('RETRY_LATER', msg('SHUTTING_DOWN'));
    }

    this.log.info({ taskId: task.id, userId, mode: task.processingMode, format: videoFormat }, 'task created');
    return ok(task);
  }

  getTask(id: string): Promise<Task | null> {
    return this.deps.tasks.get(id);
  }

  listUserTasks(userId: string, status?: TaskStatus, limit = 20): Promise<Task[]> {
    return this.deps.tasks.findByUser(userId, { status, limit });
  }

  updateTask(id: string, update: TaskUpdate): Promise<Task | null> {
    return this.deps.tasks.updatePartial(id, update);
  }

  transition(id: string, expected: readonly TaskStatus[], update: TaskUpdate): Promise<TransitionResult> {
    return this.deps.tasks.transition(id, expected, update);
  }

  /** Any active task becomes cancelled; a running pipeline notices at its next write. */
  async cancelTask(id: string): Promise<TransitionResult> {
    const result = await this.deps.tasks.transition(id, ACTIVE_STATUSES, { status: 'cancelled' });
    if (result.kind === 'updated') {
      this.log.info({ taskId: id }, 'task cancelled');
    }
    return result;
  }

  /** Removes the record and its output files. False when the task does not exist. */
  async deleteTask(id: string): Promise<boolean> {
    const task = await this.deps.tasks.delete(id);
    if (!task) return false;

    for (const file of [task.outputFile, task.subtitleFile]) {
      if (!file) continue;
      try {
        await removeFile(file);
      } catch (error) {
        this.log.warn({ taskId: id, file, err: errorMessage(error) }, 'could not remove task file');
      }
    }
    this.log.info({ taskId: id }, 'task deleted');
    return true;
  }

  /** Deletes completed and failed tasks that finished more than `retentionMs` ago. */
  async cleanupOlderThan(retentionMs: number): Promise<number> {
    const cutoff = new Date(this.now().getTime() - retentionMs);
    const stale = await this.deps.tasks.findCompletedBefore(cutoff, ['completed', 'failed']);

    let removed = 0;
    for (const task of stale) {
      if (await this.deleteTask(task.id)) removed++;
    }
    return removed;
  }

  countActiveTasks(): Promise<number> {
    return this.deps.tasks.countByStatus(ACTIVE_STATUSES);
  }

  /**
   * Startup pass: work a previous process left mid-pipeline is marked
   * failed, tasks still pending are queued again.
   */
  async recoverInterrupted(): Promise<RecoveryReport> {
    let failed = 0;
    for (const task of await this.deps.tasks.findByStatus(['downloading', 'processing'])) {
      const result = await this.deps.tasks.transition(task.id, [task.status], {
        status: 'failed',
        errorMessage: INTERRUPTED_MESSAGE,
      });
      if (result.kind === 'updated') failed++;
    }

    let resubmitted = 0;
    for (const task of await this.deps.tasks.findByStatus(['pending'])) {
      if (this.deps.coordinator.submit(task.id, this.deps.ledger.limitsFor(task.userId).priority)) {
        resubmitted++;
      }
    }

    if (failed > 0 || resubmitted > 0) {
      this.log.info({ failed, resubmitted }, 'recovered tasks from previous run');
    }
    return { failed, resubmitted };
  }
}
