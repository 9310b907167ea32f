export const USER_TIERS = ['free', 'basic', 'premium'] as const;

export type UserTier = typeof USER_TIERS[number];

export interface TierLimits {
  dailyTasks: number; // -1 = unlimited
  maxResolution: string;
  allowedModes: string[];
  priority: number;
  aiSubtitle: boolean;
  concurrentTasks: number;
  name: string;
  description: string;
  priceMonthly: string;
  priceYearly: string;
}

export interface UserUsage {
  userId: string;
  tier: string;
  dailyTaskCount: number;
  lastTaskDate: string; // YYYY-MM-DD
  totalTasks: number;
  totalBytesProcessed: number;
  createdAt: string;
  updatedAt: string;
}

export type RemainingQuota = number | 'unlimited';

export interface QuotaCheckResult {
  allowed: boolean;
  reason: string | null;
  remainingToday: RemainingQuota;
  tier: UserTier;
  limits: TierLimits;
}

export interface UserStats {
  userId: string;
  tier: string;
  dailyTasksUsed: number;
  dailyTasksLimit: RemainingQuota;
  dailyTasksRemaining: RemainingQuota;
  totalTasks: number;
  totalDataProcessedMb: number;
  maxResolution: string;
  allowedModes: string[];
  aiSubtitleEnabled: boolean;
  memberSince: string;
}

export interface QuotaSummary {
  totalUsers: number;
  usersByTier: Record<string, number>;
  totalTasks: number;
  totalBytesProcessed: number;
}
