import { FastifyPluginAsync } from 'fastify';
import { replyWithAppError } from '../errors.js';
import { parseParams } from '../middleware/validation.js';
import { CacheParamsSchema } from '../schemas/sources.js';
import { Services } from '../services.js';
import { listFormats } from '../storage/formats.js';

const MB = 1024 * 1024;
const GB = MB * 1024;

function toMb(bytes: number): number {
  return Math.round((bytes / MB) * 100) / 100;
}

export function storageRoutes(services: Services): FastifyPluginAsync {
  const { cache, lifecycle, remote, scheduler, settings } = services;

  return async (app) => {
    app.get('/storage/formats', { config: { public: true } }, async () => ({
      formats: listFormats().map((format) => ({
        id: format.id,
        description: format.description,
        estimated_size_mb_per_min: format.estimatedSizeMbPerMin,
      })),
      default_format: settings.defaultVideoFormat,
    }));

    app.get('/storage/stats', async () => {
      const stats = await lifecycle.getStorageStats();
      const remoteBytes = await remote.getRemoteUsage();
      return {
        total_size_mb: toMb(stats.totalBytes),
        file_count: stats.fileCount,
        oldest_file: stats.oldestFile,
        newest_file: stats.newestFile,
        quota_gb: lifecycle.quotaBytes / GB,
        quota_used_percent: stats.quotaUsedPercent,
        cache_hours: settings.cacheHours,
        cache_entries: cache.size,
        remote_sync_enabled: remote.enabled,
        remote_usage_mb: remoteBytes === null ? null : toMb(remoteBytes),
      };
    });

    app.post('/storage/maintenance', async (request, reply) => {
      const run = await scheduler.runOnce();
      if (!run) {
        return replyWithAppError(reply, { type: 'INTERNAL', message: 'Maintenance run failed' });
      }
      const { storage } = run;
      return {
        files_removed: storage.expiredCleanup.filesRemoved + storage.quotaCleanup.filesRemoved,
        bytes_freed_mb: toMb(storage.expiredCleanup.bytesFreed + storage.quotaCleanup.bytesFreed),
        storage_before_mb: toMb(storage.storageBefore.totalBytes),
        storage_after_mb: toMb(storage.storageAfter.totalBytes),
        tasks_removed: run.tasksRemoved,
        timestamp: storage.timestamp,
      };
    });

    app.get('/storage/cache', async () => {
      const entries = cache.allEntries();
      return {
        total: entries.length,
        entries: entries.map((entry) => ({
          key: entry.key,
          source_id: entry.sourceId,
          video_id: entry.videoId,
          format_id: entry.formatId,
          file_size_mb: toMb(entry.fileSize),
          has_subtitle: entry.hasSubtitle,
          created_at: entry.createdAt,
          last_accessed_at: entry.lastAccessedAt,
          access_count: entry.accessCount,
          in_use: cache.isPinned(entry.key),
        })),
      };
    });

    app.delete('/storage/cache/:key', async (request, reply) => {
      const { key } = parseParams(CacheParamsSchema, request.params);
      if (!cache.get(key)) {
        return replyWithAppError(reply, { type: 'NOT_FOUND', message: 'Cache entry not found' });
      }
      const freed = await cache.evict(key);
      if (!freed) {
        return replyWithAppError(reply, { type: 'CONFLICT', message: 'Cache entry is in use by a running task' });
      }
      if (!freed.persisted) {
        return replyWithAppError(reply, { type: 'INTERNAL', key: 'NOT_SAVED' });
      }
      return { files_removed: freed.filesRemoved, bytes_freed_mb: toMb(freed.bytesFreed) };
    });
  };
}
