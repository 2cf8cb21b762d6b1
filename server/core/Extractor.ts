/**
 * Contract between the job runner and the extraction tool.
 */

import type { FormatChoice } from './formats.js';

export type MediaFormat = {
  format_id: string;
  ext: string;
  resolution: string;
  filesize: number | null;
  vcodec: string;
  acodec: string;
  fps: number | null;
  tbr: number | null;
};

export type MediaMetadata = {
  title: string;
  uploader: string;
  view_count: number;
  duration: number;
  thumbnail: string;
  description: string;
  formats: MediaFormat[];
};

/**
 * Progress as the job runner understands it. The adapter turns whatever the
 * tool prints into one of these.
 */
export type ProgressEvent =
  | { phase: 'downloading'; percent?: number; speed?: number; eta?: number }
  | { phase: 'processing' };

export type ProgressSink = (event: ProgressEvent) => void;

export type FetchRequest = {
  url: string;
  format: FormatChoice;
  browser: string;
  outputDir: string;
  /** Prepended to the artifact name so concurrent jobs never collide. */
  filePrefix: string;
  signal: AbortSignal;
};

export type UpdateResult = {
  success: boolean;
  message: string;
};

export interface Extractor {
  probe(url: string, browser: string, signal?: AbortSignal): Promise<MediaMetadata>;
  /** Resolves with the absolute path of the finished artifact. */
  fetch(request: FetchRequest, onProgress: ProgressSink): Promise<string>;
  getVersion(): Promise<string>;
  update(): Promise<UpdateResult>;
}
