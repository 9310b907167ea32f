import path from 'node:path';
import { z } from 'zod';

const flag = z
  .enum(['0', '1', 'true', 'false'])
  .transform((v) => v === '1' || v === 'true');

const SettingsSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  API_KEY: z.string().min(1).optional(),
  CORS_ORIGINS: z.string().default(''),

  DATA_DIR: z.string().default('./data'),
  STORAGE_DIR: z.string().optional(),
  TIERS_CONFIG_PATH: z.string().default('./config/tiers.json'),
  SOURCES_CONFIG_PATH: z.string().default('./config/sources.json'),

  TASK_REPO_KIND: z.enum(['file', 'memory', 'redis']).default('file'),
  UPSTASH_REDIS_REST_URL: z.string().url().optional(),
  UPSTASH_REDIS_REST_TOKEN: z.string().min(1).optional(),

  MAX_CONCURRENT_TASKS: z.coerce.number().int().min(1).default(2),
  QUEUE_DEPTH_MULTIPLIER: z.coerce.number().int().min(1).default(2),
  TASK_RETENTION_HOURS: z.coerce.number().min(0).default(24),

  STORAGE_QUOTA_GB: z.coerce.number().min(0).default(10),
  CACHE_HOURS: z.coerce.number().min(0).default(24),
  CACHE_ENABLED: flag.default('1'),
  DEFAULT_VIDEO_FORMAT: z.string().default('720p'),
  MAINTENANCE_INTERVAL_MINUTES: z.coerce.number().min(0).default(60),

  WHISPER_MODEL: z.enum(['tiny', 'base', 'small', 'medium', 'large']).default('base'),
  YTDLP_PATH: z.string().default('yt-dlp'),
  FFMPEG_PATH: z.string().default('ffmpeg'),
  WHISPER_PATH: z.string().min(1).optional(),
  RCLONE_PATH: z.string().default('rclone'),

  RCLONE_REMOTE: z.string().optional(),
  ENABLE_REMOTE_SYNC: flag.default('0'),
  REMOTE_SYNC_TIMEOUT_MS: z.coerce.number().int().min(1).default(300_000),
});

export interface Settings {
  port: number;
  host: string;
  logLevel: z.infer<typeof SettingsSchema>['LOG_LEVEL'];
  apiKey: string | null;
  corsOrigins: string[];
  dataDir: string;
  storageDir: string;
  tiersConfigPath: string;
  sourcesConfigPath: string;
  repo:
    | { kind: 'file'; dataDir: string }
    | { kind: 'memory' }
    | { kind: 'redis'; url: string; token: string };
  maxConcurrentTasks: number;
  queueDepthMultiplier: number;
  taskRetentionHours: number;
  storageQuotaBytes: number;
  cacheHours: number;
  cacheEnabled: boolean;
  defaultVideoFormat: string;
  maintenanceIntervalMinutes: number;
  whisperModel: string;
  ytdlpPath: string;
  ffmpegPath: string;
  whisperPath: string | null;
  remoteSync: { enabled: boolean; remote: string | null; timeoutMs: number; rclonePath: string };
}

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

const GB = 1024 * 1024 * 1024;

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new SettingsError(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;

  const dataDir = path.resolve(e.DATA_DIR);

  let repo: Settings['repo'] = { kind: 'file', dataDir };
  if (e.TASK_REPO_KIND === 'memory') {
    repo = { kind: 'memory' };
  } else if (e.TASK_REPO_KIND === 'redis') {
    if (!e.UPSTASH_REDIS_REST_URL || !e.UPSTASH_REDIS_REST_TOKEN) {
      throw new SettingsError('UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set when TASK_REPO_KIND=redis');
    }
    repo = { kind: 'redis', url: e.UPSTASH_REDIS_REST_URL, token: e.UPSTASH_REDIS_REST_TOKEN };
  }

  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    apiKey: e.API_KEY ?? null,
    corsOrigins: e.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean),
    dataDir,
    storageDir: path.resolve(e.STORAGE_DIR ?? path.join(dataDir, 'storage')),
    tiersConfigPath: path.resolve(e.TIERS_CONFIG_PATH),
    sourcesConfigPath: path.resolve(e.SOURCES_CONFIG_PATH),
    repo,
    maxConcurrentTasks: e.MAX_CONCURRENT_TASKS,
    queueDepthMultiplier: e.QUEUE_DEPTH_MULTIPLIER,
    taskRetentionHours: e.TASK_RETENTION_HOURS,
    storageQuotaBytes: Math.round(e.STORAGE_QUOTA_GB * GB),
    cacheHours: e.CACHE_HOURS,
    cacheEnabled: e.CACHE_ENABLED,
    defaultVideoFormat: e.DEFAULT_VIDEO_FORMAT,
    maintenanceIntervalMinutes: e.MAINTENANCE_INTERVAL_MINUTES,
    whisperModel: e.WHISPER_MODEL,
    ytdlpPath: e.YTDLP_PATH,
    ffmpegPath: e.FFMPEG_PATH,
    whisperPath: e.WHISPER_PATH ?? null,
    remoteSync: {
      enabled: e.ENABLE_REMOTE_SYNC && Boolean(e.RCLONE_REMOTE),
      remote: e.RCLONE_REMOTE ?? null,
      timeoutMs: e.REMOTE_SYNC_TIMEOUT_MS,
      rclonePath: e.RCLONE_PATH,
    },
  };
}

/** Warnings worth printing at startup; an empty list means nothing to flag. */
export function productionWarnings(settings: Settings): string[] {
  const warnings: string[] = [];
  if (!settings.apiKey) {
    warnings.push('API_KEY not set: every request is accepted without authentication');
  }
  if (settings.corsOrigins.length === 0) {
    warnings.push('CORS_ORIGINS not configured: browser clients on other origins are rejected');
  }
  if (settings.whisperModel === 'medium' || settings.whisperModel === 'large') {
    warnings.push(`WHISPER_MODEL=${settings.whisperModel} needs a lot of memory; consider tiny or base`);
  }
  if (settings.repo.kind === 'memory') {
    warnings.push('TASK_REPO_KIND=memory: task records are lost on restart');
  }
  if (settings.maxConcurrentTasks > 4) {
    warnings.push(`MAX_CONCURRENT_TASKS=${settings.maxConcurrentTasks} may be too high for a small host`);
  }
  return warnings;
}
