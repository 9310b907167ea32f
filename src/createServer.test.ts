import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { FastifyInstance } from 'fastify';
import { loadSettings } from './config/settings.js';
import { createServer } from './createServer.js';
import { taskData } from './test-support/task-repository-contract.js';
import { VideoDownloader, VideoTransformer } from './types/collaborators.js';

const API_KEY = 'test-secret';

const SOURCES = {
  sources: {
    cnn10: { name: 'CNN 10', category: 'news', difficulty: 'intermediate', tags: ['news', 'daily'] },
    paused: { name: 'Paused', enabled: false },
  },
};

describe('HTTP API', () => {
  let dir: string;
  let app: FastifyInstance;

  const downloader: VideoDownloader = {
    async getVideoInfo(url) {
      return url.includes('missing')
        ? null
        : { id: 'abc123', title: 'Ten minute news', duration: 600, thumbnail: null, uploadDate: '20240301' };
    },
    async download(_url, options) {
      const filePath = path.join(dir, 'storage', 'cache', `abc123_${options?.formatId ?? '720p'}.mp4`);
      await writeFile(filePath, 'source');
      return { success: true, filePath, subtitlePath: null };
    },
  };

  const transformer: VideoTransformer = {
    async process(request) {
      await writeFile(request.outputPath, 'rendered');
      return request.outputPath;
    },
  };

  function headers(userId = 'learner-1') {
    return { 'x-api-key': API_KEY, 'x-user-id': userId };
  }

  async function createTask(payload: Record<string, unknown> = {}) {
    return app.inject({
      method: 'POST',
      url: '/api/v1/tasks',
      headers: headers(),
      payload: {
        source_id: 'cnn10',
        video_url: 'https://videos.example.test/watch?v=abc123',
        processing_mode: 'with_subtitle',
        video_format: '480p',
        ...payload,
      },
    });
  }

  async function start() {
    const settings = loadSettings({
      DATA_DIR: dir,
      TIERS_CONFIG_PATH: path.join(dir, 'tiers.json'),
      SOURCES_CONFIG_PATH: path.join(dir, 'sources.json'),
      LOG_LEVEL: 'silent',
      API_KEY,
      MAINTENANCE_INTERVAL_MINUTES: '0',
    });
    app = await createServer({ settings, overrides: { downloader, transformer } });
    await app.ready();
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'api-'));
    await writeFile(path.join(dir, 'sources.json'), JSON.stringify(SOURCES));
    await start();
  });

  afterEach(async () => {
    await app.close();
    await rm(dir, { recursive: true, force: true });
  });

  describe('GET /health', () => {
    it('should report status without an API key', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok', pending_tasks: 0, repo: { kind: 'file' } });
      expect(response.headers['x-request-id']).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    });
  });

  describe('authentication', () => {
    it('should require the API key header', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/tasks' });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({
        error: { type: 'UNAUTHORIZED', message: 'API key is required. Provide X-API-Key header.' },
      });
    });

    it('should reject a wrong API key', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/tasks', headers: { 'x-api-key': 'wrong' } });

      expect(response.statusCode).toBe(403);
      expect(response.json().error.message).toBe('Invalid API key');
    });

    it('should leave public routes open', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/quota/tiers' });

      expect(response.statusCode).toBe(200);
      expect(response.json().tiers.map((t: { id: string }) => t.id)).toEqual(['free', 'basic', 'premium']);
    });
  });

  describe('tasks', () => {
    it('should run a task to completion and serve the output', async () => {
      const created = await createTask();

      expect(created.statusCode).toBe(201);
      const { id } = created.json();
      expect(created.json()).toMatchObject({ user_id: 'learner-1', video_title: 'Ten minute news', status: 'pending' });

      await app.services.coordinator.idle();

      const fetched = await app.inject({ method: 'GET', url: `/api/v1/tasks/${id}`, headers: headers() });
      expect(fetched.json()).toMatchObject({
        status: 'completed',
        progress: 100,
        download_url: `/api/v1/tasks/${id}/download`,
        error_message: null,
      });

      const download = await app.inject({ method: 'GET', url: `/api/v1/tasks/${id}/download`, headers: headers() });
      expect(download.statusCode).toBe(200);
      expect(download.headers['content-type']).toBe('video/mp4');
      expect(download.headers['content-disposition']).toBe('attachment; filename="Ten_minute_news_abc123.mp4"');
      expect(download.body).toBe('rendered');

      const quota = await app.inject({ method: 'GET', url: '/api/v1/quota/me', headers: headers() });
      expect(quota.json()).toMatchObject({ tier: 'free', daily_tasks_used: 1, daily_tasks_remaining: 2 });
    });

    it('should pick the highest format the tier allows when none is given', async () => {
      const created = await createTask({ video_format: undefined });

      expect(created.statusCode).toBe(201);
      expect(created.json().metadata).toMatchObject({ format: '480p' });
    });

    it('should keep tasks across a restart', async () => {
      const created = await createTask();
      await app.services.coordinator.idle();
      await app.close();

      await start();
      const fetched = await app.inject({ method: 'GET', url: `/api/v1/tasks/${created.json().id}`, headers: headers() });

      expect(fetched.statusCode).toBe(200);
      expect(fetched.json()).toMatchObject({ status: 'completed', progress: 100 });
    });

    it('should list only the caller tasks', async () => {
      await app.services.repo.create(taskData({ userId: 'learner-1' }));
      await app.services.repo.create(taskData({ userId: 'someone-else' }));

      const response = await app.inject({ method: 'GET', url: '/api/v1/tasks?limit=5', headers: headers() });

      expect(response.json().total).toBe(1);
      expect(response.json().tasks[0].user_id).toBe('learner-1');
    });

    it('should reject an invalid body', async () => {
      const response = await createTask({ video_url: 'not a url' });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toMatchObject({ type: 'BAD_INPUT', message: 'Request validation failed' });
    });

    it('should reject a disabled source', async () => {
      const response = await createTask({ source_id: 'paused' });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.message).toBe("Unknown or disabled source 'paused'");
    });

    it('should refuse a format above the tier maximum', async () => {
      const response = await createTask({ video_format: '720p' });

      expect(response.statusCode).toBe(403);
      expect(response.json().error.type).toBe('QUOTA_EXCEEDED');
    });

    it('should report an unreadable video url', async () => {
      const response = await createTask({ video_url: 'https://videos.example.test/missing' });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.message).toBe('Could not get video information. Please check the URL.');
    });

    it('should refuse to serve an unfinished task', async () => {
      const task = await app.services.repo.create(taskData({ userId: 'learner-1' }));

      const response = await app.inject({ method: 'GET', url: `/api/v1/tasks/${task.id}/download`, headers: headers() });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.message).toBe('Task not completed yet');
    });

    it('should cancel a pending task once', async () => {
      const task = await app.services.repo.create(taskData({ userId: 'learner-1' }));

      const first = await app.inject({ method: 'POST', url: `/api/v1/tasks/${task.id}/cancel`, headers: headers() });
      const second = await app.inject({ method: 'POST', url: `/api/v1/tasks/${task.id}/cancel`, headers: headers() });

      expect(first.statusCode).toBe(202);
      expect(first.json()).toEqual({ message: 'Cancel request accepted', status: 'cancelled' });
      expect(second.statusCode).toBe(409);
      expect(second.json().error.message).toBe('Task cannot be cancelled in cancelled state');
    });

    it('should delete a task', async () => {
      const task = await app.services.repo.create(taskData({ userId: 'learner-1' }));

      const deleted = await app.inject({ method: 'DELETE', url: `/api/v1/tasks/${task.id}`, headers: headers() });
      const again = await app.inject({ method: 'GET', url: `/api/v1/tasks/${task.id}`, headers: headers() });

      expect(deleted.json()).toEqual({ message: 'Task deleted successfully' });
      expect(again.statusCode).toBe(404);
      expect(again.json().error).toEqual({ type: 'NOT_FOUND', message: 'Task not found' });
    });
  });

  describe('quota', () => {
    it('should check a request against the caller tier', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/quota/check?processing_mode=slow&video_format=480p',
        headers: headers(),
      });

      expect(response.json()).toEqual({
        allowed: false,
        reason: "Processing mode 'slow' not available for free tier. Upgrade to access this feature.",
        remaining_today: 3,
        tier: 'free',
        requested: { processing_mode: 'slow', video_format: '480p' },
      });
    });

    it('should change a user tier', async () => {
      const upgraded = await app.inject({
        method: 'POST',
        url: '/api/v1/quota/upgrade',
        headers: headers(),
        payload: { user_id: 'learner-2', tier: 'premium' },
      });
      const stats = await app.inject({ method: 'GET', url: '/api/v1/quota/me', headers: headers('learner-2') });

      expect(upgraded.json()).toMatchObject({ success: true, new_tier: 'premium' });
      expect(stats.json()).toMatchObject({ tier: 'premium', daily_tasks_limit: -1, daily_tasks_remaining: -1 });
    });

    it('should report a tier change that could not be saved', async () => {
      await mkdir(path.join(dir, 'user_usage.json', 'occupied'), { recursive: true });

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/quota/upgrade',
        headers: headers(),
        payload: { user_id: 'learner-2', tier: 'premium' },
      });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({
        error: { type: 'INTERNAL', message: 'The change could not be saved and may be lost on restart' },
      });
    });

    it('should reject an unknown tier', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/quota/upgrade',
        headers: headers(),
        payload: { user_id: 'learner-2', tier: 'gold' },
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('storage and sources', () => {
    it('should list the video formats', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/storage/formats' });

      expect(response.json().default_format).toBe('720p');
      expect(response.json().formats.map((f: { id: string }) => f.id)).toEqual(['360p', '480p', '720p', '1080p', 'audio_only']);
    });

    it('should run maintenance on demand', async () => {
      const response = await app.inject({ method: 'POST', url: '/api/v1/storage/maintenance', headers: headers() });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ files_removed: 0, tasks_removed: 0 });
    });

    it('should list enabled sources only', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/sources?query=daily', headers: headers() });

      expect(response.json().sources.map((s: { id: string }) => s.id)).toEqual(['cnn10']);
    });

    it('should show disabled sources to admins', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/admin/sources', headers: headers() });

      expect(response.json().sources.map((s: { id: string }) => s.id)).toEqual(['cnn10', 'paused']);
    });

    it('should refuse a tier update without a tier file', async () => {
      const response = await app.inject({
        method: 'PUT',
        url: '/api/v1/admin/tiers/free',
        headers: headers(),
        payload: { daily_tasks: 5 },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.message).toBe("Tier 'free' not found or tier config file missing");
    });
  });

  it('should answer unknown routes with a typed error', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/v1/nothing-here', headers: headers() });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: { type: 'NOT_FOUND', message: 'Route not found' } });
  });
});
