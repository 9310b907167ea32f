import {
  CreateTaskData,
  Task,
  TaskListOptions,
  TaskStatus,
  TaskUpdate,
  TransitionResult,
} from '../types/task.js';

export interface TaskRepository {
  readonly kind: 'memory' | 'file' | 'redis';

  create(data: CreateTaskData): Promise<Task>;
  get(id: string): Promise<Task | null>;

  /** Newest first, capped at `limit` (default 20). */
  findByUser(userId: string, options?: TaskListOptions): Promise<Task[]>;
  findByStatus(statuses: readonly TaskStatus[]): Promise<Task[]>;

  /**
   * Applies only the provided fields as one atomic step.
   * Throws `InvalidTransitionError` / `ValidationError` for bad updates.
   */
  updatePartial(id: string, update: TaskUpdate): Promise<Task | null>;

  /** Like `updatePartial`, but only when the current status is in `expected`. */
  transition(id: string, expected: readonly TaskStatus[], update: TaskUpdate): Promise<TransitionResult>;

  /** Removes the record and returns it, or null when it did not exist. */
  delete(id: string): Promise<Task | null>;

  /** Tasks in `statuses` whose completion time is before `cutoff`. */
  findCompletedBefore(cutoff: Date, statuses: readonly TaskStatus[]): Promise<Task[]>;

  countByStatus(statuses: readonly TaskStatus[], userId?: string): Promise<number>;
}
