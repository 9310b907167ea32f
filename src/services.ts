import { Rclone } from './adapters/rclone.js';
import { FfmpegTransformer } from './adapters/ffmpeg.js';
import { YtDlpDownloader } from './adapters/yt-dlp.js';
import { Settings } from './config/settings.js';
import { SourceConfigProvider } from './config/sources.js';
import { Logger } from './logger.js';
import { QuotaLedger } from './quota/ledger.js';
import { TierConfigProvider } from './quota/tier-config.js';
import { createTaskRepository, TaskRepository } from './repositories/index.js';
import { CacheIndex } from './storage/cache-index.js';
import { StorageLifecycle } from './storage/lifecycle.js';
import { RemoteSync } from './storage/remote-sync.js';
import { MaintenanceScheduler } from './storage/scheduler.js';
import { TaskService } from './tasks/service.js';
import { VideoDownloader, VideoTransformer } from './types/collaborators.js';
import { TaskCoordinator } from './worker/index.js';

export interface Services {
  settings: Settings;
  repo: TaskRepository;
  tiers: TierConfigProvider;
  sources: SourceConfigProvider;
  ledger: QuotaLedger;
  cache: CacheIndex;
  lifecycle: StorageLifecycle;
  remote: RemoteSync;
  downloader: VideoDownloader;
  coordinator: TaskCoordinator;
  tasks: TaskService;
  scheduler: MaintenanceScheduler;
}

/** Replacements for the parts that reach outside the process. */
export interface ServiceOverrides {
  repo?: TaskRepository;
  downloader?: VideoDownloader;
  transformer?: VideoTransformer;
  now?: () => Date;
}

const HOUR_MS = 3_600_000;

export async function buildServices(settings: Settings, log: Logger, overrides: ServiceOverrides = {}): Promise<Services> {
  const now = overrides.now;
  const repo = overrides.repo ?? createTaskRepository(settings.repo, log);

  const tiers = new TierConfigProvider(settings.tiersConfigPath, log);
  const sources = new SourceConfigProvider(settings.sourcesConfigPath, log);
  await Promise.all([tiers.reload(), sources.reload()]);

  const ledger = await QuotaLedger.open({ dataDir: settings.dataDir, tiers, log, now });
  const cache = await CacheIndex.open({ dataDir: settings.dataDir, log, now });

  const remote = new RemoteSync({
    enabled: settings.remoteSync.enabled,
    remote: settings.remoteSync.remote,
    rclone: new Rclone({ binary: settings.remoteSync.rclonePath, timeoutMs: settings.remoteSync.timeoutMs }),
    log,
  });

  const lifecycle = await StorageLifecycle.open({
    storageDir: settings.storageDir,
    quotaBytes: settings.storageQuotaBytes,
    cacheHours: settings.cacheHours,
    cache,
    remote,
    log,
    now,
  });

  const downloader = overrides.downloader ?? new YtDlpDownloader({ binary: settings.ytdlpPath, outputDir: lifecycle.cacheDir, log });
  const transformer =
    overrides.transformer ?? new FfmpegTransformer({ ffmpegPath: settings.ffmpegPath, whisperPath: settings.whisperPath, log });

  const coordinator = new TaskCoordinator(
    { tasks: repo, ledger, cache, layout: lifecycle, downloader, transformer, remote, log },
    {
      maxConcurrent: settings.maxConcurrentTasks,
      cacheEnabled: settings.cacheEnabled,
      defaultFormat: settings.defaultVideoFormat,
      modelHint: settings.whisperModel,
    }
  );

  const tasks = new TaskService(
    { tasks: repo, ledger, sources, downloader, coordinator, log, now },
    {
      maxConcurrent: settings.maxConcurrentTasks,
      queueDepthMultiplier: settings.queueDepthMultiplier,
      defaultFormat: settings.defaultVideoFormat,
    }
  );

  const scheduler = new MaintenanceScheduler({
    lifecycle,
    tasks,
    intervalMs: settings.maintenanceIntervalMinutes * 60_000,
    taskRetentionMs: settings.taskRetentionHours * HOUR_MS,
    log,
  });

  return { settings, repo, tiers, sources, ledger, cache, lifecycle, remote, downloader, coordinator, tasks, scheduler };
}
