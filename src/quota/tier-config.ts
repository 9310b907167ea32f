import { z } from 'zod';
import { ConfigUpdate, JsonConfigProvider } from '../config/snapshot.js';
import { Logger } from '../logger.js';
import { TierLimits } from '../types/quota.js';
import { SnapshotFile } from '../util/snapshot-file.js';

export const RESOLUTION_ORDER = ['360p', '480p', '720p', '1080p'] as const;

// Fallback table used only when config/tiers.json is absent or invalid.
export const DEFAULT_TIER_LIMITS: Readonly<Record<string, TierLimits>> = {
  free: {
    dailyTasks: 3,
    maxResolution: '480p',
    allowedModes: ['original', 'with_subtitle'],
    priority: 1,
    aiSubtitle: false,
    concurrentTasks: 1,
    name: 'Free',
    description: 'Basic access',
    priceMonthly: 'Free',
    priceYearly: 'Free',
  },
  basic: {
    dailyTasks: 15,
    maxResolution: '720p',
    allowedModes: ['original', 'with_subtitle', 'repeat_twice'],
    priority: 5,
    aiSubtitle: true,
    concurrentTasks: 2,
    name: 'Basic',
    description: 'For regular learners',
    priceMonthly: '19',
    priceYearly: '190',
  },
  premium: {
    dailyTasks: -1,
    maxResolution: '1080p',
    allowedModes: ['original', 'with_subtitle', 'repeat_twice', 'slow'],
    priority: 10,
    aiSubtitle: true,
    concurrentTasks: 5,
    name: 'Premium',
    description: 'Unlimited access',
    priceMonthly: '49',
    priceYearly: '490',
  },
};

const TierEntrySchema = z
  .object({
    daily_tasks: z.number().int().min(-1).default(3),
    max_resolution: z.string().default('480p'),
    allowed_modes: z.array(z.string()).default(['original']),
    priority: z.number().int().default(1),
    ai_subtitle: z.boolean().default(false),
    concurrent_tasks: z.number().int().min(1).default(1),
    name: z.string().optional(),
    description: z.string().default(''),
    price_monthly: z.string().default(''),
    price_yearly: z.string().default(''),
  })
  .passthrough();

const ProcessingModeInfoSchema = z
  .object({
    name: z.string(),
    description: z.string().default(''),
  })
  .passthrough();

export const TierFileSchema = z
  .object({
    tiers: z.record(TierEntrySchema),
    processing_modes: z.record(ProcessingModeInfoSchema).default({}),
    resolutions: z.array(z.string()).default([...RESOLUTION_ORDER]),
    _last_updated: z.string().optional(),
  })
  .passthrough();

export type TierFile = z.infer<typeof TierFileSchema>;
type TierEntry = z.infer<typeof TierEntrySchema>;

export interface ProcessingModeInfo {
  name: string;
  description: string;
}

export interface TierCatalog {
  tiers: Record<string, TierLimits>;
  processingModes: Record<string, ProcessingModeInfo>;
  resolutions: string[];
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function fromEntry(tierId: string, entry: TierEntry): TierLimits {
  return {
    dailyTasks: entry.daily_tasks,
    maxResolution: entry.max_resolution,
    allowedModes: [...entry.allowed_modes],
    priority: entry.priority,
    aiSubtitle: entry.ai_subtitle,
    concurrentTasks: entry.concurrent_tasks,
    name: entry.name ?? capitalize(tierId),
    description: entry.description,
    priceMonthly: entry.price_monthly,
    priceYearly: entry.price_yearly,
  };
}

/** Maps a camelCase patch onto the snake_case keys used in the file. */
export function toEntryPatch(patch: Partial<TierLimits>): Partial<TierEntry> {
  const out: Partial<TierEntry> = {};
  if (patch.dailyTasks !== undefined) out.daily_tasks = patch.dailyTasks;
  if (patch.maxResolution !== undefined) out.max_resolution = patch.maxResolution;
  if (patch.allowedModes !== undefined) out.allowed_modes = [...patch.allowedModes];
  if (patch.priority !== undefined) out.priority = patch.priority;
  if (patch.aiSubtitle !== undefined) out.ai_subtitle = patch.aiSubtitle;
  if (patch.concurrentTasks !== undefined) out.concurrent_tasks = patch.concurrentTasks;
  if (patch.name !== undefined) out.name = patch.name;
  if (patch.description !== undefined) out.description = patch.description;
  if (patch.priceMonthly !== undefined) out.price_monthly = patch.priceMonthly;
  if (patch.priceYearly !== undefined) out.price_yearly = patch.priceYearly;
  return out;
}

export function buildTierCatalog(doc: TierFile): TierCatalog {
  const tiers: Record<string, TierLimits> = {};
  for (const [tierId, entry] of Object.entries(doc.tiers)) {
    tiers[tierId] = fromEntry(tierId, entry);
  }
  const processingModes: Record<string, ProcessingModeInfo> = {};
  for (const [modeId, info] of Object.entries(doc.processing_modes)) {
    processingModes[modeId] = { name: info.name, description: info.description };
  }
  return { tiers, processingModes, resolutions: [...doc.resolutions] };
}

export function defaultTierCatalog(): TierCatalog {
  const tiers: Record<string, TierLimits> = {};
  for (const [tierId, limits] of Object.entries(DEFAULT_TIER_LIMITS)) {
    tiers[tierId] = { ...limits, allowedModes: [...limits.allowedModes] };
  }
  return { tiers, processingModes: {}, resolutions: [...RESOLUTION_ORDER] };
}

export class TierConfigProvider extends JsonConfigProvider<TierFile, TierCatalog> {
  constructor(filePath: string, log: Logger) {
    super({
      name: 'tiers',
      file: new SnapshotFile(filePath, TierFileSchema, log),
      build: buildTierCatalog,
      fallback: defaultTierCatalog,
      log,
    });
  }

  /** Limits for a tier id; unknown ids fall back to free. */
  tierLimits(tierId: string): TierLimits {
    const { tiers } = this.current();
    return tiers[tierId] ?? tiers.free ?? DEFAULT_TIER_LIMITS.free;
  }

  tierIds(): string[] {
    return Object.keys(this.current().tiers);
  }

  /**
   * Admin path: merges `patch` into the tier's file entry, stamps
   * `_last_updated` and reloads. `missing` when the file or tier does not exist.
   */
  updateTier(tierId: string, patch: Partial<TierLimits>, today: string): Promise<ConfigUpdate> {
    return this.update((doc) => {
      const entry = doc.tiers[tierId];
      if (!entry) return null;
      return {
        ...doc,
        tiers: { ...doc.tiers, [tierId]: { ...entry, ...toEntryPatch(patch) } },
        _last_updated: today,
      };
    });
  }
}
