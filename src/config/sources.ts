import { z } from 'zod';
import { Logger } from '../logger.js';
import { SnapshotFile } from '../util/snapshot-file.js';
import { JsonConfigProvider } from './snapshot.js';

const SourceEntrySchema = z
  .object({
    name: z.string().optional(),
    description: z.string().default(''),
    url: z.string().default(''),
    channel_id: z.string().nullable().default(null),
    category: z.string().default('general'),
    language: z.string().default('en'),
    difficulty: z.string().default('intermediate'),
    typical_duration: z.string().default('varies'),
    update_frequency: z.string().default('varies'),
    subtitle_available: z.boolean().default(true),
    enabled: z.boolean().default(true),
    tags: z.array(z.string()).default([]),
  })
  .passthrough();

const NamedEntrySchema = z
  .object({
    name: z.string().optional(),
    description: z.string().default(''),
  })
  .passthrough();

export const SourceFileSchema = z
  .object({
    sources: z.record(SourceEntrySchema).default({}),
    categories: z.record(NamedEntrySchema).default({}),
    difficulty_levels: z.record(NamedEntrySchema).default({}),
    _last_updated: z.string().optional(),
  })
  .passthrough();

export type SourceFile = z.infer<typeof SourceFileSchema>;

export interface VideoSource {
  id: string;
  name: string;
  description: string;
  url: string;
  channelId: string | null;
  category: string;
  language: string;
  difficulty: string;
  typicalDuration: string;
  updateFrequency: string;
  subtitleAvailable: boolean;
  enabled: boolean;
  tags: string[];
}

export interface NamedItem {
  id: string;
  name: string;
  description: string;
}

export interface SourceCatalog {
  sources: Record<string, VideoSource>;
  categories: Record<string, NamedItem>;
  difficultyLevels: Record<string, NamedItem>;
}

export interface SourceSearch {
  query?: string;
  category?: string;
  difficulty?: string;
  language?: string;
  enabledOnly?: boolean;
}

function named(entries: Record<string, z.infer<typeof NamedEntrySchema>>): Record<string, NamedItem> {
  const out: Record<string, NamedItem> = {};
  for (const [id, entry] of Object.entries(entries)) {
    out[id] = { id, name: entry.name ?? id, description: entry.description };
  }
  return out;
}

export function buildSourceCatalog(doc: SourceFile): SourceCatalog {
  const sources: Record<string, VideoSource> = {};
  for (const [id, entry] of Object.entries(doc.sources)) {
    sources[id] = {
      id,
      name: entry.name ?? id,
      description: entry.description,
      url: entry.url,
      channelId: entry.channel_id,
      category: entry.category,
      language: entry.language,
      difficulty: entry.difficulty,
      typicalDuration: entry.typical_duration,
      updateFrequency: entry.update_frequency,
      subtitleAvailable: entry.subtitle_available,
      enabled: entry.enabled,
      tags: [...entry.tags],
    };
  }
  return {
    sources,
    categories: named(doc.categories),
    difficultyLevels: named(doc.difficulty_levels),
  };
}

function emptyCatalog(): SourceCatalog {
  return { sources: {}, categories: {}, difficultyLevels: {} };
}

/**
 * Catalogue of video sources read from config/sources.json. Without the
 * file no source is known and every task creation is refused.
 */
export class SourceConfigProvider extends JsonConfigProvider<SourceFile, SourceCatalog> {
  constructor(filePath: string, log: Logger) {
    super({
      name: 'sources',
      file: new SnapshotFile(filePath, SourceFileSchema, log),
      build: buildSourceCatalog,
      fallback: emptyCatalog,
      log,
    });
  }

  getSource(sourceId: string): VideoSource | null {
    return this.current().sources[sourceId] ?? null;
  }

  /** The source only if it exists and is enabled. */
  usableSource(sourceId: string): VideoSource | null {
    const source = this.getSource(sourceId);
    return source && source.enabled ? source : null;
  }

  listSources(enabledOnly = true): VideoSource[] {
    const all = Object.values(this.current().sources);
    return enabledOnly ? all.filter(source => source.enabled) : all;
  }

  search(filters: SourceSearch = {}): VideoSource[] {
    let sources = this.listSources(filters.enabledOnly ?? true);

    if (filters.category) sources = sources.filter(s => s.category === filters.category);
    if (filters.difficulty) sources = sources.filter(s => s.difficulty === filters.difficulty);
    const language = filters.language;
    if (language) sources = sources.filter(s => s.language.startsWith(language));

    const query = filters.query?.toLowerCase();
    if (query) {
      sources = sources.filter(s =>
        s.name.toLowerCase().includes(query) ||
        s.description.toLowerCase().includes(query) ||
        s.tags.some(tag => tag.toLowerCase().includes(query))
      );
    }
    return sources;
  }
}
