import { VideoFormat } from '../types/storage.js';

export const VIDEO_FORMATS: readonly VideoFormat[] = [
  { id: '360p', selector: 'best[height<=360][ext=mp4]/best[height<=360]', description: 'Low quality (360p) - ~15MB/10min', estimatedSizeMbPerMin: 1.5 },
  { id: '480p', selector: 'best[height<=480][ext=mp4]/best[height<=480]', description: 'Medium quality (480p) - ~25MB/10min', estimatedSizeMbPerMin: 2.5 },
  { id: '720p', selector: 'best[height<=720][ext=mp4]/best[height<=720]', description: 'HD quality (720p) - ~50MB/10min', estimatedSizeMbPerMin: 5 },
  { id: '1080p', selector: 'best[height<=1080][ext=mp4]/best[height<=1080]', description: 'Full HD (1080p) - ~100MB/10min', estimatedSizeMbPerMin: 10 },
  { id: 'audio_only', selector: 'bestaudio', description: 'Audio only - ~10MB/10min', estimatedSizeMbPerMin: 1 },
];

export const FALLBACK_FORMAT_ID = '720p';

export function listFormats(): VideoFormat[] {
  return VIDEO_FORMATS.map(format => ({ ...format }));
}

export function findFormat(formatId: string): VideoFormat | null {
  return VIDEO_FORMATS.find(format => format.id === formatId) ?? null;
}

/** yt-dlp selector for a format id; unknown ids get the 720p selector. */
export function formatSelector(formatId: string): string {
  const format = findFormat(formatId) ?? findFormat(FALLBACK_FORMAT_ID);
  return format ? format.selector : 'best';
}
