import { monotonicFactory } from 'ulid';
import { z } from 'zod';
import { InvalidTransitionError, ValidationError } from '../errors.js';
import {
  CreateTaskData,
  isTerminal,
  PROCESSING_MODES,
  Task,
  TaskStatus,
  TASK_STATUSES,
  TaskUpdate,
} from '../types/task.js';

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['downloading', 'failed', 'cancelled'],
  downloading: ['processing', 'failed', 'cancelled'],
  processing: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

const nextId = monotonicFactory();

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return from === to || ALLOWED_TRANSITIONS[from].includes(to);
}

export function newTask(data: CreateTaskData, now = new Date()): Task {
  return {
    id: nextId(now.getTime()),
    userId: data.userId,
    sourceId: data.sourceId,
    videoId: data.videoId,
    videoUrl: data.videoUrl,
    videoTitle: data.videoTitle,
    status: 'pending',
    processingMode: data.processingMode,
    progress: 0,
    createdAt: now,
    updatedAt: now,
    completedAt: null,
    outputFile: null,
    subtitleFile: null,
    errorMessage: null,
    metadata: { ...(data.metadata ?? {}) },
  };
}

/**
 * Merges `update` into `task`. Only keys present on `update` are applied.
 *
 * - `updatedAt` is always refreshed.
 * - Entering a terminal status stamps `completedAt` once.
 * - While the task is active, progress never moves backwards.
 */
export function applyTaskUpdate(task: Task, update: TaskUpdate, now = new Date()): Task {
  const next: Task = { ...task, updatedAt: now };

  if (update.status !== undefined && update.status !== task.status) {
    if (!canTransition(task.status, update.status)) {
      throw new InvalidTransitionError(task.status, update.status);
    }
    next.status = update.status;
    if (isTerminal(update.status) && next.completedAt === null) {
      next.completedAt = now;
    }
  }

  if (update.progress !== undefined) {
    if (!Number.isInteger(update.progress) || update.progress < 0 || update.progress > 100) {
      throw new ValidationError('progress must be an integer between 0 and 100', { progress: update.progress });
    }
    next.progress = isTerminal(task.status) ? update.progress : Math.max(task.progress, update.progress);
  }

  if (update.outputFile !== undefined) next.outputFile = update.outputFile;
  if (update.subtitleFile !== undefined) next.subtitleFile = update.subtitleFile;
  if (update.errorMessage !== undefined) next.errorMessage = update.errorMessage;
  if (update.metadata !== undefined) next.metadata = { ...task.metadata, ...update.metadata };

  return next;
}

/** A copy that shares nothing mutable with `task`. */
export function copyTask(task: Task): Task {
  return { ...task, metadata: structuredClone(task.metadata) };
}

/** Newest first; ULIDs break ties within the same millisecond. */
export function newestFirst(a: Task, b: Task): number {
  const byTime = b.createdAt.getTime() - a.createdAt.getTime();
  if (byTime !== 0) return byTime;
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

/** A task as written to JSON storage, with ISO timestamps. */
export const StoredTaskSchema = z.object({
  id: z.string(),
  userId: z.string(),
  sourceId: z.string(),
  videoId: z.string(),
  videoUrl: z.string(),
  videoTitle: z.string(),
  status: z.enum(TASK_STATUSES),
  processingMode: z.enum(PROCESSING_MODES),
  progress: z.number(),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().nullable(),
  outputFile: z.string().nullable(),
  subtitleFile: z.string().nullable(),
  errorMessage: z.string().nullable(),
  metadata: z.record(z.unknown()).default({}),
});

export type StoredTask = z.infer<typeof StoredTaskSchema>;

export function toStoredTask(task: Task): StoredTask {
  return {
    ...task,
    createdAt: task.createdAt.toISOString(),
    updatedAt: task.updatedAt.toISOString(),
    completedAt: task.completedAt?.toISOString() ?? null,
  };
}

export function fromStoredTask(stored: StoredTask): Task {
  return {
    ...stored,
    createdAt: new Date(stored.createdAt),
    updatedAt: new Date(stored.updatedAt),
    completedAt: stored.completedAt ? new Date(stored.completedAt) : null,
  };
}
