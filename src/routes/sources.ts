import { FastifyPluginAsync } from 'fastify';
import { replyWithAppError } from '../errors.js';
import { parseBody, parseParams, parseQuery } from '../middleware/validation.js';
import { PreviewSchema, SourceParamsSchema, SourceQuerySchema } from '../schemas/sources.js';
import { Services } from '../services.js';
import { VideoSource } from '../config/sources.js';

export function toSourceResponse(source: VideoSource) {
  return {
    id: source.id,
    name: source.name,
    description: source.description,
    url: source.url,
    category: source.category,
    language: source.language,
    difficulty: source.difficulty,
    typical_duration: source.typicalDuration,
    update_frequency: source.updateFrequency,
    subtitle_available: source.subtitleAvailable,
    enabled: source.enabled,
    tags: source.tags,
  };
}

export function sourceRoutes(services: Services): FastifyPluginAsync {
  const { sources, downloader } = services;

  return async (app) => {
    app.get('/sources', async (request) => {
      const query = parseQuery(SourceQuerySchema, request.query);
      return { sources: sources.search(query).map(toSourceResponse) };
    });

    app.get('/sources/:sourceId', async (request, reply) => {
      const { sourceId } = parseParams(SourceParamsSchema, request.params);
      const source = sources.usableSource(sourceId);
      if (!source) {
        return replyWithAppError(reply, { type: 'NOT_FOUND', key: 'SOURCE_NOT_FOUND' });
      }
      return toSourceResponse(source);
    });

    app.post('/sources/preview', async (request, reply) => {
      const { url } = parseBody(PreviewSchema, request.body);
      const info = await downloader.getVideoInfo(url);
      if (!info) {
        return replyWithAppError(reply, { type: 'BAD_INPUT', key: 'VIDEO_INFO_UNAVAILABLE' });
      }
      return {
        id: info.id,
        title: info.title,
        url,
        thumbnail: info.thumbnail,
        duration: info.duration,
        upload_date: info.uploadDate,
      };
    });
  };
}
