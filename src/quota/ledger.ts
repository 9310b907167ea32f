import path from 'node:path';
import { z } from 'zod';
import { fmt } from '../lib/error-messages.js';
import { Logger } from '../logger.js';
import {
  QuotaCheckResult,
  QuotaSummary,
  RemainingQuota,
  TierLimits,
  UserStats,
  UserTier,
  UserUsage,
  USER_TIERS,
} from '../types/quota.js';
import { Persisted, SnapshotFile } from '../util/snapshot-file.js';
import { RESOLUTION_ORDER } from './tier-config.js';

const UserUsageSchema = z.object({
  userId: z.string(),
  tier: z.string().default('free'),
  dailyTaskCount: z.number().int().min(0).default(0),
  lastTaskDate: z.string().default(''),
  totalTasks: z.number().int().min(0).default(0),
  totalBytesProcessed: z.number().min(0).default(0),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const UsageFileSchema = z.record(UserUsageSchema);

export interface TierLimitsSource {
  tierLimits(tierId: string): TierLimits;
}

export interface QuotaLedgerOptions {
  dataDir: string;
  tiers: TierLimitsSource;
  log: Logger;
  now?: () => Date;
}

/** Local calendar date as YYYY-MM-DD. */
export function calendarDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

function resolutionRank(resolution: string): number {
  const idx = RESOLUTION_ORDER.findIndex((r) => r === resolution);
  return idx === -1 ? 0 : idx;
}

function resolveTier(tier: string): UserTier {
  return USER_TIERS.find((t) => t === tier) ?? 'free';
}

/**
 * Per-user usage counters and tier gate.
 *
 * The whole user map is persisted to `user_usage.json` after every
 * mutation. If a write fails the in-memory state stays authoritative
 * and the next successful save catches the file up.
 */
export class QuotaLedger {
  private users = new Map<string, UserUsage>();
  private file: SnapshotFile<Record<string, UserUsage>>;
  private now: () => Date;
  private log: Logger;

  constructor(private options: QuotaLedgerOptions) {
    this.log = options.log.child({ component: 'quota' });
    this.now = options.now ?? (() => new Date());
    this.file = new SnapshotFile(path.join(options.dataDir, 'user_usage.json'), UsageFileSchema, this.log);
  }

  static async open(options: QuotaLedgerOptions): Promise<QuotaLedger> {
    const ledger = new QuotaLedger(options);
    await ledger.load();
    return ledger;
  }

  async load(): Promise<void> {
    const loaded = await this.file.load();
    this.users.clear();
    if (loaded.status === 'loaded') {
      for (const [userId, usage] of Object.entries(loaded.data)) {
        this.users.set(userId, usage);
      }
    } else if (loaded.status === 'invalid') {
      this.log.warn({ reason: loaded.reason }, 'failed to load usage data, starting empty');
    }
    this.log.info({ users: this.users.size }, 'quota ledger initialised');
  }

  get userCount(): number {
    return this.users.size;
  }

  async checkQuota(userId: string, processingMode: string, resolution: string): Promise<QuotaCheckResult> {
    const user = this.getOrCreate(userId);
    const tier = resolveTier(user.tier);
    const limits = this.options.tiers.tierLimits(tier);

    const reset = this.resetIfNewDay(user);
    if (reset) await this.persist();

    const remaining = this.remaining(limits, user.dailyTaskCount);

    if (limits.dailyTasks !== -1 && user.dailyTaskCount >= limits.dailyTasks) {
      return {
        allowed: false,
        reason: fmt('QUOTA_DAILY_LIMIT', { limit: limits.dailyTasks, tier }),
        remainingToday: 0,
        tier,
        limits,
      };
    }

    if (!limits.allowedModes.includes(processingMode)) {
      return {
        allowed: false,
        reason: fmt('QUOTA_MODE', { mode: processingMode, tier }),
        remainingToday: remaining,
        tier,
        limits,
      };
    }

    if (resolutionRank(resolution) > resolutionRank(limits.maxResolution)) {
      return {
        allowed: false,
        reason: fmt('QUOTA_RESOLUTION', { resolution, tier, max: limits.maxResolution }),
        remainingToday: remaining,
        tier,
        limits,
      };
    }

    return { allowed: true, reason: null, remainingToday: remaining, tier, limits };
  }

  /** Counts one finished task against the user's daily and lifetime totals. */
  async recordTask(userId: string, bytesProcessed = 0): Promise<Persisted<UserUsage>> {
    const user = this.getOrCreate(userId);
    this.resetIfNewDay(user);

    user.dailyTaskCount += 1;
    user.totalTasks += 1;
    user.totalBytesProcessed += Math.max(0, bytesProcessed);
    user.updatedAt = this.now().toISOString();

    const persisted = await this.persist();
    this.log.info({ userId, daily: user.dailyTaskCount, total: user.totalTasks }, 'task recorded');
    return { value: { ...user }, persisted };
  }

  async setTier(userId: string, tier: UserTier): Promise<Persisted<UserUsage>> {
    const user = this.getOrCreate(userId);
    const previous = user.tier;
    user.tier = tier;
    user.updatedAt = this.now().toISOString();

    const persisted = await this.persist();
    this.log.info({ userId, from: previous, to: tier }, 'user tier changed');
    return { value: { ...user }, persisted };
  }

  /** `preferred`, lowered to the tier's maximum resolution when it is above it. */
  formatFor(userId: string, preferred: string): string {
    const { maxResolution } = this.limitsFor(userId);
    return resolutionRank(preferred) > resolutionRank(maxResolution) ? maxResolution : preferred;
  }

  /** Limits of the user's tier without creating a usage record. */
  limitsFor(userId: string): TierLimits {
    return this.options.tiers.tierLimits(resolveTier(this.users.get(userId)?.tier ?? 'free'));
  }

  getUsage(userId: string): UserUsage | null {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  /** Display projection; does not create or modify the stored record. */
  getUserStats(userId: string): UserStats {
    const nowIso = this.now().toISOString();
    const user = this.users.get(userId) ?? this.blankUsage(userId, nowIso);
    const limits = this.options.tiers.tierLimits(resolveTier(user.tier));
    const today = calendarDate(this.now());
    const dailyCount = user.lastTaskDate === today ? user.dailyTaskCount : 0;

    return {
      userId,
      tier: user.tier,
      dailyTasksUsed: dailyCount,
      dailyTasksLimit: limits.dailyTasks === -1 ? 'unlimited' : limits.dailyTasks,
      dailyTasksRemaining: this.remaining(limits, dailyCount),
      totalTasks: user.totalTasks,
      totalDataProcessedMb: user.totalBytesProcessed / (1024 * 1024),
      maxResolution: limits.maxResolution,
      allowedModes: [...limits.allowedModes],
      aiSubtitleEnabled: limits.aiSubtitle,
      memberSince: user.createdAt,
    };
  }

  getAllUserStats(): UserStats[] {
    return Array.from(this.users.keys()).map((userId) => this.getUserStats(userId));
  }

  getSummary(): QuotaSummary {
    const usersByTier: Record<string, number> = {};
    let totalTasks = 0;
    let totalBytesProcessed = 0;
    for (const user of this.users.values()) {
      usersByTier[user.tier] = (usersByTier[user.tier] ?? 0) + 1;
      totalTasks += user.totalTasks;
      totalBytesProcessed += user.totalBytesProcessed;
    }
    return { totalUsers: this.users.size, usersByTier, totalTasks, totalBytesProcessed };
  }

  private remaining(limits: TierLimits, used: number): RemainingQuota {
    if (limits.dailyTasks === -1) return 'unlimited';
    return Math.max(0, limits.dailyTasks - used);
  }

  private resetIfNewDay(user: UserUsage): boolean {
    const today = calendarDate(this.now());
    if (user.lastTaskDate === today) return false;
    user.dailyTaskCount = 0;
    user.lastTaskDate = today;
    return true;
  }

  private getOrCreate(userId: string): UserUsage {
    let user = this.users.get(userId);
    if (!user) {
      user = this.blankUsage(userId, this.now().toISOString());
      this.users.set(userId, user);
      this.log.info({ userId }, 'created usage record');
    }
    return user;
  }

  private blankUsage(userId: string, nowIso: string): UserUsage {
    return {
      userId,
      tier: 'free',
      dailyTaskCount: 0,
      lastTaskDate: '',
      totalTasks: 0,
      totalBytesProcessed: 0,
      createdAt: nowIso,
      updatedAt: nowIso,
    };
  }

  private persist(): Promise<boolean> {
    return this.file.save(Object.fromEntries(this.users));
  }
}
