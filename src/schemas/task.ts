import { z } from 'zod';
import { PROCESSING_MODES, TASK_STATUSES } from '../types/task.js';

export const TaskStatusSchema = z.enum(TASK_STATUSES);
export const ProcessingModeSchema = z.enum(PROCESSING_MODES);

export const CreateTaskSchema = z.object({
  source_id: z.string().min(1),
  video_url: z.string().url(),
  processing_mode: ProcessingModeSchema.default('with_subtitle'),
  video_format: z.string().min(1).optional(),
});

export const TaskQuerySchema = z.object({
  status: TaskStatusSchema.optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const TaskParamsSchema = z.object({
  taskId: z.string().min(1),
});

export type CreateTaskRequest = z.infer<typeof CreateTaskSchema>;
export type TaskQuery = z.infer<typeof TaskQuerySchema>;
