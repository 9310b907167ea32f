import { z } from 'zod';
import {
  CreateTaskData,
  Task,
  TaskListOptions,
  TaskStatus,
  TaskUpdate,
  TransitionResult,
} from '../types/task.js';
import { KeyedMutex } from '../util/keyed-mutex.js';
import { TaskRepository } from './base.js';
import {
  applyTaskUpdate,
  fromStoredTask,
  newestFirst,
  newTask,
  StoredTaskSchema,
  toStoredTask,
} from './task-update.js';

const UpstashResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z.string().optional(),
});

const StringList = z.array(z.string());
const NullableStringList = z.array(z.string().nullable());

/**
 * Task store backed by the Upstash Redis REST API.
 *
 * Layout:
 *   task:{id}             JSON document
 *   tasks:user:{userId}   ZSET of ids scored by createdAt
 *   tasks:status:{status} ZSET of ids scored by updatedAt
 *   tasks:completed       ZSET of terminal ids scored by completedAt
 *
 * Read-modify-write on one task is serialised per id in this process.
 */
export class RedisTaskRepository implements TaskRepository {
  readonly kind = 'redis' as const;
  private baseUrl: string;
  private token: string;
  private locks = new KeyedMutex();

  constructor(url: string, token: string) {
    this.baseUrl = url.replace(/\/$/, '');
    this.token = token;
  }

  private async redis(command: string[]): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}/`, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.token}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(command),
    });

    if (!response.ok) {
      throw new Error(`Redis request failed: ${response.status} ${response.statusText}`);
    }

    const data = UpstashResponseSchema.parse(await response.json());
    if (data.error) {
      throw new Error(`Redis error: ${data.error}`);
    }

    return data.result ?? null;
  }

  private taskKey(id: string): string {
    return `task:${id}`;
  }

  private userKey(userId: string): string {
    return `tasks:user:${userId}`;
  }

  private statusKey(status: TaskStatus): string {
    return `tasks:status:${status}`;
  }

  private completedKey(): string {
    return 'tasks:completed';
  }

  private serializeTask(task: Task): string {
    return JSON.stringify(toStoredTask(task));
  }

  private deserializeTask(data: string): Task {
    return fromStoredTask(StoredTaskSchema.parse(JSON.parse(data)));
  }

  private async loadMany(ids: string[]): Promise<Task[]> {
    if (ids.length === 0) return [];
    const data = NullableStringList.parse(await this.redis(['MGET', ...ids.map(id => this.taskKey(id))]));
    return data
      .filter((item): item is string => item !== null)
      .map(item => this.deserializeTask(item));
  }

  private async write(previous: Task | null, task: Task): Promise<void> {
    await this.redis(['SET', this.taskKey(task.id), this.serializeTask(task)]);

    if (previous && previous.status !== task.status) {
      await this.redis(['ZREM', this.statusKey(previous.status), task.id]);
    }
    await this.redis(['ZADD', this.statusKey(task.status), String(task.updatedAt.getTime()), task.id]);

    if (task.completedAt && !previous?.completedAt) {
      await this.redis(['ZADD', this.completedKey(), String(task.completedAt.getTime()), task.id]);
    }
  }

  async create(data: CreateTaskData): Promise<Task> {
    const task = newTask(data);

    await this.write(null, task);
    await this.redis(['ZADD', this.userKey(task.userId), String(task.createdAt.getTime()), task.id]);

    return task;
  }

  async get(id: string): Promise<Task | null> {
    const data = await this.redis(['GET', this.taskKey(id)]);
    return typeof data === 'string' ? this.deserializeTask(data) : null;
  }

  async findByUser(userId: string, options: TaskListOptions = {}): Promise<Task[]> {
    const limit = options.limit ?? 20;

    // Without a status filter the sorted set already gives the page
    const stop = options.status ? '-1' : String(limit - 1);
    const ids = StringList.parse(await this.redis(['ZREVRANGE', this.userKey(userId), '0', stop]));

    let tasks = await this.loadMany(ids);
    if (options.status) {
      tasks = tasks.filter(task => task.status === options.status);
    }

    tasks.sort(newestFirst);
    return tasks.slice(0, limit);
  }

  async findByStatus(statuses: readonly TaskStatus[]): Promise<Task[]> {
    const ids: string[] = [];
    for (const status of statuses) {
      ids.push(...StringList.parse(await this.redis(['ZRANGE', this.statusKey(status), '0', '-1'])));
    }
    const tasks = await this.loadMany(ids);
    return tasks.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async updatePartial(id: string, update: TaskUpdate): Promise<Task | null> {
    return this.locks.run(id, async () => {
      const existing = await this.get(id);
      if (!existing) return null;

      const updated = applyTaskUpdate(existing, update);
      await this.write(existing, updated);
      return updated;
    });
  }

  async transition(id: string, expected: readonly TaskStatus[], update: TaskUpdate): Promise<TransitionResult> {
    return this.locks.run(id, async (): Promise<TransitionResult> => {
      const existing = await this.get(id);
      if (!existing) return { kind: 'not_found' };
      if (!expected.includes(existing.status)) return { kind: 'conflict', task: existing };

      const updated = applyTaskUpdate(existing, update);
      await this.write(existing, updated);
      return { kind: 'updated', task: updated };
    });
  }

  async delete(id: string): Promise<Task | null> {
    return this.locks.run(id, async () => {
      const existing = await this.get(id);
      if (!existing) return null;

      await this.redis(['DEL', this.taskKey(id)]);
      await this.redis(['ZREM', this.userKey(existing.userId), id]);
      await this.redis(['ZREM', this.statusKey(existing.status), id]);
      await this.redis(['ZREM', this.completedKey(), id]);

      return existing;
    });
  }

  async findCompletedBefore(cutoff: Date, statuses: readonly TaskStatus[]): Promise<Task[]> {
    // Scores are inclusive in Redis; the "(" prefix makes the bound exclusive
    const ids = StringList.parse(
      await this.redis(['ZRANGEBYSCORE', this.completedKey(), '-inf', `(${cutoff.getTime()}`])
    );
    const tasks = await this.loadMany(ids);
    return tasks.filter(task => statuses.includes(task.status));
  }

  async countByStatus(statuses: readonly TaskStatus[], userId?: string): Promise<number> {
    if (userId) {
      const ids = StringList.parse(await this.redis(['ZRANGE', this.userKey(userId), '0', '-1']));
      const tasks = await this.loadMany(ids);
      return tasks.filter(task => statuses.includes(task.status)).length;
    }

    const counts = await Promise.all(
      statuses.map(status => this.redis(['ZCARD', this.statusKey(status)]))
    );
    return counts.reduce<number>((sum, count) => sum + (typeof count === 'number' ? count : 0), 0);
  }
}
