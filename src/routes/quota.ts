import { FastifyPluginAsync } from 'fastify';
import { replyWithAppError } from '../errors.js';
import { userIdOf } from '../middleware/auth.js';
import { parseBody, parseQuery } from '../middleware/validation.js';
import { QuotaCheckQuerySchema, UpgradeTierSchema } from '../schemas/quota.js';
import { Services } from '../services.js';
import { RemainingQuota, UserStats, USER_TIERS } from '../types/quota.js';

const MB = 1024 * 1024;

// -1 stands for unlimited on the wire
function wireCount(value: RemainingQuota): number {
  return value === 'unlimited' ? -1 : value;
}

export function toUserQuotaResponse(stats: UserStats) {
  return {
    user_id: stats.userId,
    tier: stats.tier,
    daily_tasks_used: stats.dailyTasksUsed,
    daily_tasks_limit: wireCount(stats.dailyTasksLimit),
    daily_tasks_remaining: wireCount(stats.dailyTasksRemaining),
    total_tasks: stats.totalTasks,
    total_data_processed_mb: stats.totalDataProcessedMb,
    max_resolution: stats.maxResolution,
    allowed_modes: stats.allowedModes,
    ai_subtitle_enabled: stats.aiSubtitleEnabled,
    member_since: stats.memberSince,
  };
}

export function quotaRoutes(services: Services): FastifyPluginAsync {
  const { ledger, tiers } = services;

  return async (app) => {
    app.get('/quota/tiers', { config: { public: true } }, async () => {
      const catalog = tiers.current();
      return {
        tiers: Object.entries(catalog.tiers).map(([id, limits]) => ({
          id,
          name: limits.name,
          daily_tasks: limits.dailyTasks,
          max_resolution: limits.maxResolution,
          allowed_modes: limits.allowedModes,
          ai_subtitle: limits.aiSubtitle,
          concurrent_tasks: limits.concurrentTasks,
          price_monthly: limits.priceMonthly,
          price_yearly: limits.priceYearly,
        })),
        processing_modes: catalog.processingModes,
        resolutions: catalog.resolutions,
      };
    });

    app.get('/quota/me', async (request) => {
      return toUserQuotaResponse(ledger.getUserStats(userIdOf(request)));
    });

    app.get('/quota/check', async (request) => {
      const query = parseQuery(QuotaCheckQuerySchema, request.query);
      const result = await ledger.checkQuota(userIdOf(request), query.processing_mode, query.video_format);
      return {
        allowed: result.allowed,
        reason: result.reason,
        remaining_today: wireCount(result.remainingToday),
        tier: result.tier,
        requested: { processing_mode: query.processing_mode, video_format: query.video_format },
      };
    });

    app.post('/quota/upgrade', async (request, reply) => {
      const body = parseBody(UpgradeTierSchema, request.body);
      const { value: user, persisted } = await ledger.setTier(body.user_id, body.tier);
      if (!persisted) {
        return replyWithAppError(reply, { type: 'INTERNAL', key: 'NOT_SAVED' });
      }
      return {
        success: true,
        user_id: user.userId,
        new_tier: user.tier,
        message: `User tier updated to ${user.tier}`,
      };
    });

    app.get('/quota/users', async () => {
      const users = ledger.getAllUserStats().map(toUserQuotaResponse);
      return { total_users: users.length, users };
    });

    app.get('/quota/stats', async () => {
      const summary = ledger.getSummary();
      return {
        total_users: summary.totalUsers,
        users_by_tier: summary.usersByTier,
        total_tasks_processed: summary.totalTasks,
        total_data_processed_gb: summary.totalBytesProcessed / MB / 1024,
        tiers_available: [...USER_TIERS],
      };
    });
  };
}
