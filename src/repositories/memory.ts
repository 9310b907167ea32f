import {
  CreateTaskData,
  Task,
  TaskListOptions,
  TaskStatus,
  TaskUpdate,
  TransitionResult,
} from '../types/task.js';
import { TaskRepository } from './base.js';
import { applyTaskUpdate, copyTask, newestFirst, newTask } from './task-update.js';

export class InMemoryTaskRepository implements TaskRepository {
  readonly kind = 'memory' as const;
  private tasks = new Map<string, Task>();

  constructor(initial: Iterable<Task> = []) {
    for (const task of initial) {
      this.tasks.set(task.id, copyTask(task));
    }
  }

  /** Every stored task, oldest first. */
  all(): Task[] {
    return Array.from(this.tasks.values())
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(copyTask);
  }

  async create(data: CreateTaskData): Promise<Task> {
    const task = newTask(data);
    this.tasks.set(task.id, copyTask(task));
    return task;
  }

  async get(id: string): Promise<Task | null> {
    const task = this.tasks.get(id);
    return task ? copyTask(task) : null;
  }

  async findByUser(userId: string, options: TaskListOptions = {}): Promise<Task[]> {
    let tasks = Array.from(this.tasks.values()).filter(task => task.userId === userId);

    if (options.status) {
      tasks = tasks.filter(task => task.status === options.status);
    }

    tasks.sort(newestFirst);
    return tasks.slice(0, options.limit ?? 20).map(copyTask);
  }

  async findByStatus(statuses: readonly TaskStatus[]): Promise<Task[]> {
    return Array.from(this.tasks.values())
      .filter(task => statuses.includes(task.status))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(copyTask);
  }

  // The read, merge and write below run without an await in between,
  // so no other update of the same task can interleave.
  async updatePartial(id: string, update: TaskUpdate): Promise<Task | null> {
    const task = this.tasks.get(id);
    if (!task) return null;

    const updated = applyTaskUpdate(task, update);
    this.tasks.set(id, updated);
    return copyTask(updated);
  }

  async transition(id: string, expected: readonly TaskStatus[], update: TaskUpdate): Promise<TransitionResult> {
    const task = this.tasks.get(id);
    if (!task) return { kind: 'not_found' };
    if (!expected.includes(task.status)) return { kind: 'conflict', task: copyTask(task) };

    const updated = applyTaskUpdate(task, update);
    this.tasks.set(id, updated);
    return { kind: 'updated', task: copyTask(updated) };
  }

  async delete(id: string): Promise<Task | null> {
    const task = this.tasks.get(id);
    if (!task) return null;
    this.tasks.delete(id);
    return task;
  }

  async findCompletedBefore(cutoff: Date, statuses: readonly TaskStatus[]): Promise<Task[]> {
    return Array.from(this.tasks.values())
      .filter(task =>
        statuses.includes(task.status) &&
        task.completedAt !== null &&
        task.completedAt < cutoff
      )
      .map(copyTask);
  }

  async countByStatus(statuses: readonly TaskStatus[], userId?: string): Promise<number> {
    let count = 0;
    for (const task of this.tasks.values()) {
      if (statuses.includes(task.status) && (!userId || task.userId === userId)) {
        count++;
      }
    }
    return count;
  }
}
