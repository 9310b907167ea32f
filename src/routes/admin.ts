import { FastifyPluginAsync } from 'fastify';
import { replyWithAppError } from '../errors.js';
import { fmt } from '../lib/error-messages.js';
import { calendarDate } from '../quota/ledger.js';
import { parseBody, parseParams } from '../middleware/validation.js';
import { TierParamsSchema, TierPatch, TierPatchSchema } from '../schemas/quota.js';
import { SourceParamsSchema } from '../schemas/sources.js';
import { Services } from '../services.js';
import { TierLimits } from '../types/quota.js';
import { toSourceResponse } from './sources.js';

function toLimitsPatch(patch: TierPatch): Partial<TierLimits> {
  const out: Partial<TierLimits> = {};
  if (patch.daily_tasks !== undefined) out.dailyTasks = patch.daily_tasks;
  if (patch.max_resolution !== undefined) out.maxResolution = patch.max_resolution;
  if (patch.allowed_modes !== undefined) out.allowedModes = [...patch.allowed_modes];
  if (patch.priority !== undefined) out.priority = patch.priority;
  if (patch.ai_subtitle !== undefined) out.aiSubtitle = patch.ai_subtitle;
  if (patch.concurrent_tasks !== undefined) out.concurrentTasks = patch.concurrent_tasks;
  if (patch.name !== undefined) out.name = patch.name;
  if (patch.description !== undefined) out.description = patch.description;
  if (patch.price_monthly !== undefined) out.priceMonthly = patch.price_monthly;
  if (patch.price_yearly !== undefined) out.priceYearly = patch.price_yearly;
  return out;
}

export function adminRoutes(services: Services): FastifyPluginAsync {
  const { tiers, sources } = services;

  return async (app) => {
    app.get('/admin/tiers', async () => {
      const snapshot = tiers.snapshot();
      return {
        version: snapshot.version,
        origin: snapshot.origin,
        loaded_at: snapshot.loadedAt.toISOString(),
        config_file: tiers.filePath,
        tiers: snapshot.value.tiers,
        processing_modes: snapshot.value.processingModes,
        resolutions: snapshot.value.resolutions,
      };
    });

    app.put('/admin/tiers/:tierId', async (request, reply) => {
      const { tierId } = parseParams(TierParamsSchema, request.params);
      const patch = parseBody(TierPatchSchema, request.body);

      const outcome = await tiers.updateTier(tierId, toLimitsPatch(patch), calendarDate(new Date()));
      if (outcome === 'missing') {
        return replyWithAppError(reply, { type: 'NOT_FOUND', message: fmt('TIER_NOT_FOUND', { tierId }) });
      }
      if (outcome === 'not_saved') {
        return replyWithAppError(reply, { type: 'INTERNAL', key: 'NOT_SAVED' });
      }
      request.log.info({ tierId, fields: Object.keys(patch) }, 'tier updated');
      return { success: true, tier_id: tierId, tier: tiers.tierLimits(tierId) };
    });

    app.post('/admin/tiers/reload', async () => {
      const snapshot = await tiers.reload();
      return { success: true, version: snapshot.version, origin: snapshot.origin, tiers: Object.keys(snapshot.value.tiers) };
    });

    app.get('/admin/sources', async () => {
      const snapshot = sources.snapshot();
      return {
        version: snapshot.version,
        origin: snapshot.origin,
        loaded_at: snapshot.loadedAt.toISOString(),
        config_file: sources.filePath,
        sources: sources.listSources(false).map(toSourceResponse),
        categories: Object.values(snapshot.value.categories),
        difficulty_levels: Object.values(snapshot.value.difficultyLevels),
      };
    });

    app.get('/admin/sources/:sourceId', async (request, reply) => {
      const { sourceId } = parseParams(SourceParamsSchema, request.params);
      const source = sources.getSource(sourceId);
      if (!source) {
        return replyWithAppError(reply, { type: 'NOT_FOUND', key: 'SOURCE_NOT_FOUND' });
      }
      return toSourceResponse(source);
    });

    app.post('/admin/sources/reload', async () => {
      const snapshot = await sources.reload();
      return { success: true, version: snapshot.version, origin: snapshot.origin, sources: Object.keys(snapshot.value.sources).length };
    });

    app.post('/admin/reload-all', async () => {
      const [tierSnapshot, sourceSnapshot] = await Promise.all([tiers.reload(), sources.reload()]);
      return { success: true, tiers_version: tierSnapshot.version, sources_version: sourceSnapshot.version };
    });
  };
}
