export const TASK_STATUSES = [
  'pending',
  'downloading',
  'processing',
  'completed',
  'failed',
  'cancelled',
] as const;

export const PROCESSING_MODES = ['original', 'with_subtitle', 'repeat_twice', 'slow'] as const;

export type TaskStatus = typeof TASK_STATUSES[number];
export type ProcessingMode = typeof PROCESSING_MODES[number];

export const ACTIVE_STATUSES: readonly TaskStatus[] = ['pending', 'downloading', 'processing'];
export const TERMINAL_STATUSES: readonly TaskStatus[] = ['completed', 'failed', 'cancelled'];

export interface Task {
  id: string; // ULID
  userId: string;
  sourceId: string;
  videoId: string;
  videoUrl: string;
  videoTitle: string;
  status: TaskStatus;
  processingMode: ProcessingMode;
  progress: number; // 0..100
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
  outputFile: string | null;
  subtitleFile: string | null;
  errorMessage: string | null;
  metadata: Record<string, unknown>;
}

export interface CreateTaskData {
  userId: string;
  sourceId: string;
  videoId: string;
  videoUrl: string;
  videoTitle: string;
  processingMode: ProcessingMode;
  metadata?: Record<string, unknown>;
}

export interface TaskUpdate {
  status?: TaskStatus;
  progress?: number;
  outputFile?: string | null;
  subtitleFile?: string | null;
  errorMessage?: string | null;
  metadata?: Record<string, unknown>;
}

export interface TaskListOptions {
  status?: TaskStatus;
  limit?: number;
}

export type TransitionResult =
  | { kind: 'updated'; task: Task }
  | { kind: 'not_found' }
  | { kind: 'conflict'; task: Task };

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isActive(status: TaskStatus): boolean {
  return ACTIVE_STATUSES.includes(status);
}
