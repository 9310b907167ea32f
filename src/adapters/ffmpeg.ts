import { copyFile, mkdtemp, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Logger } from '../logger.js';
import { ProgressCallback, TransformRequest, VideoTransformer } from '../types/collaborators.js';
import { fileSize } from '../util/files.js';
import { CommandRunner, CommandSpec, runCommand } from './command.js';

export const SLOW_SPEED = 0.75;

export type SubtitleStyle = Record<string, string | number>;

const BASE_STYLE: SubtitleStyle = {
  FontName: 'Arial',
  FontSize: 24,
  PrimaryColour: '&H00FFFFFF',
  OutlineColour: '&H00000000',
  BorderStyle: 1,
  Outline: 2,
  Shadow: 0,
  Alignment: 2,
  MarginV: 30,
};

export const SUBTITLE_STYLES = {
  standard: { ...BASE_STYLE, FontSize: 20 },
  repeat: { ...BASE_STYLE, FontSize: 20, PrimaryColour: '&H0000FFFF' },
  slow: { ...BASE_STYLE, FontSize: 22 },
} satisfies Record<string, SubtitleStyle>;

/** Escapes a path for use as a filter argument value. */
export function escapeFilterValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/:/g, '\\:').replace(/'/g, "\\'");
}

export function subtitleFilter(subtitlePath: string, style: SubtitleStyle): string {
  const forced = Object.entries(style).map(([key, value]) => `${key}=${value}`).join(',');
  return `subtitles=${escapeFilterValue(subtitlePath)}:force_style='${forced}'`;
}

/** atempo only accepts 0.5..2.0, so larger changes are chained. */
export function atempoChain(speed: number): string {
  if (speed <= 0) throw new RangeError('speed must be positive');
  const parts: string[] = [];
  let remaining = speed;
  while (remaining > 2) {
    parts.push('atempo=2.0');
    remaining /= 2;
  }
  while (remaining < 0.5) {
    parts.push('atempo=0.5');
    remaining /= 0.5;
  }
  parts.push(`atempo=${remaining}`);
  return parts.join(',');
}

const PROGRESS_FLAGS = ['-progress', 'pipe:1', '-nostats'];

export function buildBurnArgs(input: string, subtitlePath: string, output: string, style: SubtitleStyle): string[] {
  return ['-i', input, '-vf', subtitleFilter(subtitlePath, style), '-c:a', 'copy', ...PROGRESS_FLAGS, '-y', output];
}

export function buildSpeedArgs(input: string, output: string, speed: number): string[] {
  return [
    '-i', input,
    '-filter:v', `setpts=${1 / speed}*PTS`,
    '-filter:a', atempoChain(speed),
    ...PROGRESS_FLAGS,
    '-y', output,
  ];
}

export function buildConvertArgs(input: string, output: string): string[] {
  return ['-i', input, '-c:v', 'libx264', '-c:a', 'aac', ...PROGRESS_FLAGS, '-y', output];
}

export function buildConcatArgs(listFile: string, output: string): string[] {
  return ['-f', 'concat', '-safe', '0', '-i', listFile, '-c', 'copy', '-y', output];
}

export function concatList(files: string[]): string {
  return files.map(file => `file '${path.resolve(file).replace(/'/g, "'\\''")}'\n`).join('');
}

/** Seconds from a `Duration: 00:01:02.50` banner line. */
export function parseDurationLine(line: string): number | null {
  const match = /Duration:\s*(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/.exec(line);
  if (!match) return null;
  return Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3]);
}

/** Seconds from an `out_time_us=` (or legacy `out_time_ms=`) progress line. */
export function parseProgressLine(line: string): number | null {
  const match = /^out_time_(?:us|ms)=(\d+)$/.exec(line.trim());
  return match ? Number(match[1]) / 1_000_000 : null;
}

export interface FfmpegTransformerOptions {
  ffmpegPath: string;
  whisperPath: string | null;
  log: Logger;
  run?: CommandRunner;
}

/** Renders the four learning modes with ffmpeg; subtitles come from the download or whisper. */
export class FfmpegTransformer implements VideoTransformer {
  private run: CommandRunner;
  private log: Logger;

  constructor(private options: FfmpegTransformerOptions) {
    this.run = options.run ?? runCommand;
    this.log = options.log.child({ component: 'ffmpeg' });
  }

  async process(request: TransformRequest): Promise<string> {
    const workDir = await mkdtemp(path.join(path.dirname(request.outputPath), '.work-'));
    try {
      switch (request.mode) {
        case 'original':
          await this.original(request.inputPath, request.outputPath, request.onProgress);
          break;
        case 'with_subtitle':
          await this.withSubtitle(request, workDir);
          break;
        case 'repeat_twice':
          await this.repeatTwice(request, workDir);
          break;
        case 'slow':
          await this.slow(request, workDir);
          break;
      }
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
    return request.outputPath;
  }

  private async withSubtitle(request: TransformRequest, workDir: string): Promise<void> {
    const subtitle = await this.resolveSubtitle(request, workDir);
    if (!subtitle) {
      this.log.warn({ input: request.inputPath }, 'no subtitle available, keeping original video');
      await this.original(request.inputPath, request.outputPath, request.onProgress);
      return;
    }
    await this.ffmpeg(buildBurnArgs(request.inputPath, subtitle, request.outputPath, SUBTITLE_STYLES.standard), request.onProgress);
  }

  private async repeatTwice(request: TransformRequest, workDir: string): Promise<void> {
    const subtitle = await this.resolveSubtitle(request, workDir);
    const listFile = path.join(workDir, 'concat_list.txt');

    if (!subtitle) {
      this.log.warn({ input: request.inputPath }, 'no subtitle available, repeating original video');
      await writeFile(listFile, concatList([request.inputPath, request.inputPath]), 'utf8');
    } else {
      const first = path.join(workDir, 'part1.mp4');
      const second = path.join(workDir, 'part2.mp4');
      await this.original(request.inputPath, first);
      await this.ffmpeg(buildBurnArgs(request.inputPath, subtitle, second, SUBTITLE_STYLES.repeat), request.onProgress);
      await writeFile(listFile, concatList([first, second]), 'utf8');
    }
    await this.ffmpeg(buildConcatArgs(listFile, request.outputPath));
  }

  private async slow(request: TransformRequest, workDir: string): Promise<void> {
    const subtitle = await this.resolveSubtitle(request, workDir);
    if (!subtitle) {
      this.log.warn({ input: request.inputPath }, 'no subtitle available, slow video only');
      await this.ffmpeg(buildSpeedArgs(request.inputPath, request.outputPath, SLOW_SPEED), request.onProgress);
      return;
    }
    // Burn first so the subtitle timeline is stretched together with the picture
    const subbed = path.join(workDir, 'subbed.mp4');
    await this.ffmpeg(buildBurnArgs(request.inputPath, subtitle, subbed, SUBTITLE_STYLES.slow), request.onProgress);
    await this.ffmpeg(buildSpeedArgs(subbed, request.outputPath, SLOW_SPEED));
  }

  private async original(input: string, output: string, onProgress?: ProgressCallback): Promise<void> {
    if (path.extname(input).toLowerCase() === path.extname(output).toLowerCase()) {
      await copyFile(input, output);
      return;
    }
    await this.ffmpeg(buildConvertArgs(input, output), onProgress);
  }

  private async resolveSubtitle(request: TransformRequest, workDir: string): Promise<string | null> {
    if (request.subtitlePath && (await fileSize(request.subtitlePath)) !== null) {
      return request.subtitlePath;
    }
    const whisper = this.options.whisperPath;
    if (!whisper) return null;

    await this.run({
      command: whisper,
      args: [request.inputPath, '--model', request.modelHint, '--output_format', 'srt', '--output_dir', workDir],
    });
    const generated = path.join(workDir, `${path.parse(request.inputPath).name}.srt`);
    return (await fileSize(generated)) === null ? null : generated;
  }

  private async ffmpeg(args: string[], onProgress?: ProgressCallback): Promise<void> {
    const spec: CommandSpec = { command: this.options.ffmpegPath, args: ['-hide_banner', ...args] };
    if (onProgress) {
      let total = 0;
      spec.onStderrLine = (line) => {
        const duration = parseDurationLine(line);
        if (duration !== null && total === 0) total = duration;
      };
      spec.onStdoutLine = (line) => {
        const current = parseProgressLine(line);
        if (current !== null && total > 0) onProgress(Math.min(current, total), total);
      };
    }
    await this.run(spec);
  }
}
