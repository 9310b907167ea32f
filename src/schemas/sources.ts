import { z } from 'zod';

export const SourceQuerySchema = z.object({
  query: z.string().min(1).optional(),
  category: z.string().min(1).optional(),
  difficulty: z.string().min(1).optional(),
  language: z.string().min(1).optional(),
});

export const SourceParamsSchema = z.object({
  sourceId: z.string().min(1),
});

export const CacheParamsSchema = z.object({
  key: z.string().min(1),
});

export const PreviewSchema = z.object({
  url: z.string().url(),
});
