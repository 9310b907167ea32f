import path from 'node:path';
import { z } from 'zod';
import { AppError } from '../errors.js';
import { msg } from '../lib/error-messages.js';
import { Logger } from '../logger.js';
import {
  CreateTaskData,
  Task,
  TaskListOptions,
  TaskStatus,
  TaskUpdate,
  TransitionResult,
} from '../types/task.js';
import { SnapshotFile } from '../util/snapshot-file.js';
import { TaskRepository } from './base.js';
import { InMemoryTaskRepository } from './memory.js';
import { fromStoredTask, StoredTaskSchema, toStoredTask } from './task-update.js';

const TaskFileSchema = z.array(StoredTaskSchema);

export const TASKS_FILE = 'tasks.json';

/**
 * Task records kept in memory and written to `<dataDir>/tasks.json` after
 * every change. The file is read on first use.
 *
 * A change that cannot be written throws an INTERNAL `AppError`. The change
 * itself stays in memory, except for `create`, which is undone.
 */
export class FileTaskRepository implements TaskRepository {
  readonly kind = 'file' as const;
  private readonly file: SnapshotFile<z.infer<typeof TaskFileSchema>>;
  private loaded: Promise<InMemoryTaskRepository> | null = null;

  constructor(dataDir: string, private log: Logger) {
    this.file = new SnapshotFile(path.join(dataDir, TASKS_FILE), TaskFileSchema, log);
  }

  async create(data: CreateTaskData): Promise<Task> {
    const tasks = await this.tasks();
    const task = await tasks.create(data);
    if (!(await this.persist(tasks))) {
      await tasks.delete(task.id);
      throw new AppError('INTERNAL', msg('NOT_SAVED'));
    }
    return task;
  }

  async get(id: string): Promise<Task | null> {
    return (await this.tasks()).get(id);
  }

  async findByUser(userId: string, options?: TaskListOptions): Promise<Task[]> {
    return (await this.tasks()).findByUser(userId, options);
  }

  async findByStatus(statuses: readonly TaskStatus[]): Promise<Task[]> {
    return (await this.tasks()).findByStatus(statuses);
  }

  async updatePartial(id: string, update: TaskUpdate): Promise<Task | null> {
    const tasks = await this.tasks();
    const updated = await tasks.updatePartial(id, update);
    if (updated) await this.persistOrThrow(tasks);
    return updated;
  }

  async transition(id: string, expected: readonly TaskStatus[], update: TaskUpdate): Promise<TransitionResult> {
    const tasks = await this.tasks();
    const result = await tasks.transition(id, expected, update);
    if (result.kind === 'updated') await this.persistOrThrow(tasks);
    return result;
  }

  async delete(id: string): Promise<Task | null> {
    const tasks = await this.tasks();
    const removed = await tasks.delete(id);
    if (removed) await this.persistOrThrow(tasks);
    return removed;
  }

  async findCompletedBefore(cutoff: Date, statuses: readonly TaskStatus[]): Promise<Task[]> {
    return (await this.tasks()).findCompletedBefore(cutoff, statuses);
  }

  async countByStatus(statuses: readonly TaskStatus[], userId?: string): Promise<number> {
    return (await this.tasks()).countByStatus(statuses, userId);
  }

  private tasks(): Promise<InMemoryTaskRepository> {
    if (!this.loaded) {
      this.loaded = this.load();
    }
    return this.loaded;
  }

  private async load(): Promise<InMemoryTaskRepository> {
    const result = await this.file.load();
    switch (result.status) {
      case 'loaded':
        return new InMemoryTaskRepository(result.data.map(fromStoredTask));
      case 'missing':
        return new InMemoryTaskRepository();
      case 'invalid':
        // Starting empty would overwrite the file on the next write
        throw new AppError('INTERNAL', `Task file ${this.file.filePath} is unreadable: ${result.reason}`);
    }
  }

  private persist(tasks: InMemoryTaskRepository): Promise<boolean> {
    return this.file.save(tasks.all().map(toStoredTask));
  }

  private async persistOrThrow(tasks: InMemoryTaskRepository): Promise<void> {
    if (!(await this.persist(tasks))) {
      this.log.error({ file: this.file.filePath }, 'task change kept in memory only');
      throw new AppError('INTERNAL', msg('NOT_SAVED'));
    }
  }
}
