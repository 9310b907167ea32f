import { ProcessingMode } from './task.js';

export interface VideoInfo {
  id: string;
  title: string;
  duration: number; // seconds
  thumbnail: string | null;
  uploadDate: string | null;
}

export type DownloadResult =
  | { success: true; filePath: string; subtitlePath: string | null }
  | { success: false; error: string };

export interface DownloadOptions {
  formatId?: string;
}

/** Fetches source videos. Implementations never throw for expected failures. */
export interface VideoDownloader {
  download(url: string, options?: DownloadOptions): Promise<DownloadResult>;
  getVideoInfo(url: string): Promise<VideoInfo | null>;
}

export type ProgressCallback = (current: number, total: number) => void;

export interface TransformRequest {
  inputPath: string;
  outputPath: string;
  mode: ProcessingMode;
  sourceUrl: string;
  subtitlePath: string | null;
  modelHint: string;
  onProgress?: ProgressCallback;
}

/** Renders a learning-mode output. Rejects on failure. */
export interface VideoTransformer {
  process(request: TransformRequest): Promise<string>;
}
