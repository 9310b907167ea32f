import { z } from 'zod';
import { USER_TIERS } from '../types/quota.js';
import { ProcessingModeSchema } from './task.js';

export const UserTierSchema = z.enum(USER_TIERS);

export const QuotaCheckQuerySchema = z.object({
  processing_mode: ProcessingModeSchema.default('with_subtitle'),
  video_format: z.string().min(1).default('720p'),
});

export const UpgradeTierSchema = z.object({
  user_id: z.string().min(1),
  tier: UserTierSchema,
});

export const TierPatchSchema = z
  .object({
    daily_tasks: z.number().int().min(-1),
    max_resolution: z.string().min(1),
    allowed_modes: z.array(ProcessingModeSchema).min(1),
    priority: z.number().int().min(0),
    ai_subtitle: z.boolean(),
    concurrent_tasks: z.number().int().min(1),
    name: z.string().min(1),
    description: z.string(),
    price_monthly: z.string(),
    price_yearly: z.string(),
  })
  .partial()
  .strict();

export const TierParamsSchema = z.object({
  tierId: z.string().min(1),
});

export type TierPatch = z.infer<typeof TierPatchSchema>;
