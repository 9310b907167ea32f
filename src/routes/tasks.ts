import { createReadStream } from 'node:fs';
import path from 'node:path';
import { FastifyPluginAsync } from 'fastify';
import { replyWithAppError, replyWithFailure } from '../errors.js';
import { fmt } from '../lib/error-messages.js';
import { userIdOf } from '../middleware/auth.js';
import { parseBody, parseParams, parseQuery } from '../middleware/validation.js';
import { CreateTaskSchema, TaskParamsSchema, TaskQuerySchema } from '../schemas/task.js';
import { Services } from '../services.js';
import { Task } from '../types/task.js';
import { fileSize } from '../util/files.js';

export function toTaskResponse(task: Task) {
  return {
    id: task.id,
    user_id: task.userId,
    source_id: task.sourceId,
    video_id: task.videoId,
    video_url: task.videoUrl,
    video_title: task.videoTitle,
    status: task.status,
    processing_mode: task.processingMode,
    progress: task.progress,
    created_at: task.createdAt.toISOString(),
    updated_at: task.updatedAt.toISOString(),
    completed_at: task.completedAt?.toISOString() ?? null,
    download_url: task.status === 'completed' && task.outputFile ? `/api/v1/tasks/${task.id}/download` : null,
    error_message: task.errorMessage,
    metadata: task.metadata,
  };
}

/** `<title>_<videoId>.mp4` with anything unsafe for a header replaced. */
export function downloadFileName(task: Task, outputFile: string): string {
  const title = task.videoTitle.slice(0, 50).replace(/[^\w.-]+/g, '_');
  return `${title}_${task.videoId}${path.extname(outputFile) || '.mp4'}`;
}

export function taskRoutes(services: Services): FastifyPluginAsync {
  return async (app) => {
    app.post('/tasks', async (request, reply) => {
      const body = parseBody(CreateTaskSchema, request.body);

      const result = await services.tasks.createTask({
        userId: userIdOf(request),
        sourceId: body.source_id,
        videoUrl: body.video_url,
        processingMode: body.processing_mode,
        videoFormat: body.video_format,
      });
      if (!result.ok) {
        return replyWithFailure(reply, result.error);
      }
      return reply.code(201).send(toTaskResponse(result.value));
    });

    app.get('/tasks', async (request) => {
      const query = parseQuery(TaskQuerySchema, request.query);
      const tasks = await services.tasks.listUserTasks(userIdOf(request), query.status, query.limit);
      return { tasks: tasks.map(toTaskResponse), total: tasks.length };
    });

    app.get('/tasks/:taskId', async (request, reply) => {
      const { taskId } = parseParams(TaskParamsSchema, request.params);
      const task = await services.tasks.getTask(taskId);
      if (!task) {
        return replyWithAppError(reply, { type: 'NOT_FOUND', key: 'TASK_NOT_FOUND' });
      }
      return toTaskResponse(task);
    });

    app.get('/tasks/:taskId/download', async (request, reply) => {
      const { taskId } = parseParams(TaskParamsSchema, request.params);
      const task = await services.tasks.getTask(taskId);
      if (!task) {
        return replyWithAppError(reply, { type: 'NOT_FOUND', key: 'TASK_NOT_FOUND' });
      }
      if (task.status !== 'completed') {
        return replyWithAppError(reply, { type: 'BAD_INPUT', key: 'TASK_NOT_COMPLETED' });
      }
      const output = task.outputFile;
      const size = output ? await fileSize(output) : null;
      if (!output || size === null) {
        return replyWithAppError(reply, { type: 'NOT_FOUND', key: 'OUTPUT_NOT_FOUND' });
      }

      return reply
        .header('Content-Disposition', `attachment; filename="${downloadFileName(task, output)}"`)
        .header('Content-Length', size)
        .type('video/mp4')
        .send(createReadStream(output));
    });

    app.post('/tasks/:taskId/cancel', async (request, reply) => {
      const { taskId } = parseParams(TaskParamsSchema, request.params);
      const result = await services.tasks.cancelTask(taskId);

      switch (result.kind) {
        case 'not_found':
          return replyWithAppError(reply, { type: 'NOT_FOUND', key: 'TASK_NOT_FOUND' });
        case 'conflict':
          return replyWithAppError(reply, {
            type: 'CONFLICT',
            message: fmt('TASK_ALREADY_FINISHED', { status: result.task.status }),
          });
        case 'updated':
          return reply.code(202).send({ message: 'Cancel request accepted', status: result.task.status });
      }
    });

    app.delete('/tasks/:taskId', async (request, reply) => {
      const { taskId } = parseParams(TaskParamsSchema, request.params);
      if (!(await services.tasks.deleteTask(taskId))) {
        return replyWithAppError(reply, { type: 'NOT_FOUND', key: 'TASK_NOT_FOUND' });
      }
      return { message: 'Task deleted successfully' };
    });
  };
}
