import path from 'node:path';
import fg from 'fast-glob';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { Logger } from '../logger.js';
import { formatSelector, FALLBACK_FORMAT_ID } from '../storage/formats.js';
import { DownloadOptions, DownloadResult, VideoDownloader, VideoInfo } from '../types/collaborators.js';
import { CommandRunner, runCommand } from './command.js';

const InfoSchema = z.object({
  id: z.string(),
  title: z.string().default(''),
  duration: z.number().nullable().optional(),
  thumbnail: z.string().nullable().optional(),
  upload_date: z.string().nullable().optional(),
});

const SUBTITLE_EXTENSIONS = new Set(['.srt', '.vtt']);

export interface YtDlpDownloaderOptions {
  binary: string;
  outputDir: string;
  log: Logger;
  timeoutMs?: number;
  run?: CommandRunner;
}

export function buildInfoArgs(url: string): string[] {
  return ['--dump-json', '--skip-download', '--no-warnings', '--no-playlist', url];
}

export function buildDownloadArgs(url: string, selector: string, outputBase: string): string[] {
  return [
    '--no-warnings',
    '--no-playlist',
    '--newline',
    '-f', selector,
    '-o', `${outputBase}.%(ext)s`,
    '--write-subs',
    '--write-auto-subs',
    '--sub-langs', 'en',
    '--convert-subs', 'srt',
    url,
  ];
}

/** Picks the media file and the subtitle among the files yt-dlp produced. */
export function pickDownloadedFiles(files: string[]): { media: string | null; subtitle: string | null } {
  let media: string | null = null;
  let subtitle: string | null = null;
  for (const file of [...files].sort()) {
    const ext = path.extname(file).toLowerCase();
    if (ext === '.part' || ext === '.ytdl') continue;
    if (SUBTITLE_EXTENSIONS.has(ext)) {
      subtitle = subtitle ?? file;
    } else {
      media = media ?? file;
    }
  }
  return { media, subtitle };
}

export class YtDlpDownloader implements VideoDownloader {
  private run: CommandRunner;
  private log: Logger;

  constructor(private options: YtDlpDownloaderOptions) {
    this.run = options.run ?? runCommand;
    this.log = options.log.child({ component: 'yt-dlp' });
  }

  async getVideoInfo(url: string): Promise<VideoInfo | null> {
    try {
      const { stdout } = await this.run({
        command: this.options.binary,
        args: buildInfoArgs(url),
        timeoutMs: this.options.timeoutMs,
      });
      const info = InfoSchema.parse(JSON.parse(stdout));
      return {
        id: info.id,
        title: info.title,
        duration: info.duration ?? 0,
        thumbnail: info.thumbnail ?? null,
        uploadDate: info.upload_date ?? null,
      };
    } catch (error) {
      this.log.warn({ url, err: errorMessage(error) }, 'failed to get video info');
      return null;
    }
  }

  async download(url: string, options: DownloadOptions = {}): Promise<DownloadResult> {
    const info = await this.getVideoInfo(url);
    if (!info) return { success: false, error: 'Failed to get video info' };

    const formatId = options.formatId ?? FALLBACK_FORMAT_ID;
    const base = `${info.id}_${formatId}`;
    try {
      await this.run({
        command: this.options.binary,
        args: buildDownloadArgs(url, formatSelector(formatId), path.join(this.options.outputDir, base)),
        timeoutMs: this.options.timeoutMs,
      });
    } catch (error) {
      this.log.error({ url, err: errorMessage(error) }, 'download failed');
      return { success: false, error: errorMessage(error) };
    }

    const files = await fg(`${fg.escapePath(base)}.*`, { cwd: this.options.outputDir, absolute: true, onlyFiles: true });
    const { media, subtitle } = pickDownloadedFiles(files);
    if (!media) return { success: false, error: 'Downloaded file not found' };

    this.log.info({ url, file: media, subtitle }, 'download finished');
    return { success: true, filePath: media, subtitlePath: subtitle };
  }
}
