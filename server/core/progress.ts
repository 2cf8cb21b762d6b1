/**
 * yt-dlp output parsing. The adapter asks the tool to print machine-readable
 * progress through `--progress-template` and the final path through
 * `--print after_move:`; anything else the tool prints is passed back as a
 * log line.
 */

import type { ProgressEvent } from './Extractor.js';

export const PROGRESS_MARKER = '@@progress ';
export const PROCESSING_MARKER = '@@processing ';
export const ARTIFACT_MARKER = '@@artifact ';

export const DOWNLOAD_TEMPLATE =
  `download:${PROGRESS_MARKER}` +
  '%(progress.downloaded_bytes)s|%(progress.total_bytes)s|%(progress.total_bytes_estimate)s|' +
  '%(progress.speed)s|%(progress.eta)s|%(progress.status)s';

export const POSTPROCESS_TEMPLATE = `postprocess:${PROCESSING_MARKER}%(progress.status)s|%(progress.postprocessor)s`;

export const ARTIFACT_TEMPLATE = `after_move:${ARTIFACT_MARKER}%(filepath)s`;

export type ToolLine =
  | { type: 'progress'; event: ProgressEvent }
  | { type: 'artifact'; path: string }
  | { type: 'log'; text: string };

const PROCESSING_HINTS = ['[merger]', '[extractaudio]', '[ffmpeg', '[fixup', '[videoconvertor]', '[metadata]'];

/** Non-negative finite number, or undefined for "NA", "None" and garbage. */
export function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (!trimmed || trimmed === 'NA' || trimmed === 'None') return undefined;
  const n = Number(trimmed);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

export const round1 = (n: number): number => Math.round(n * 10) / 10;

/**
 * Percentage of `downloaded` against the reported total, falling back to the
 * estimate. Undefined when neither total is known.
 */
export function percentOf(downloaded?: number, total?: number, estimate?: number): number | undefined {
  if (downloaded === undefined) return undefined;
  const denom = total && total > 0 ? total : estimate && estimate > 0 ? estimate : undefined;
  if (denom === undefined) return undefined;
  return round1(Math.min(100, (downloaded / denom) * 100));
}

function parseTemplateProgress(body: string): ProgressEvent {
  const [downloaded, total, estimate, speed, eta, status] = body.split('|');
  if (status?.trim() === 'finished') return { phase: 'processing' };

  const event: { phase: 'downloading'; percent?: number; speed?: number; eta?: number } = { phase: 'downloading' };
  const percent = percentOf(parseNumber(downloaded), parseNumber(total), parseNumber(estimate));
  if (percent !== undefined) event.percent = percent;
  const bytesPerSecond = parseNumber(speed);
  if (bytesPerSecond !== undefined) event.speed = round1(bytesPerSecond);
  const seconds = parseNumber(eta);
  if (seconds !== undefined) event.eta = Math.round(seconds);
  return event;
}

/**
 * Fallback for the tool's default progress line, e.g.
 * `[download]  45.3% of 10.00MiB at 1.00MiB/s ETA 00:05`.
 */
function parseLegacyProgress(text: string): ProgressEvent | undefined {
  if (!/^\[download\]/i.test(text)) return undefined;
  const pctMatch = text.match(/(\d{1,3}(?:\.\d+)?)%/);
  if (!pctMatch) return undefined;
  return { phase: 'downloading', percent: Math.max(0, Math.min(100, parseFloat(pctMatch[1]))) };
}

export function hasProcessingHint(text: string): boolean {
  const lower = text.toLowerCase();
  return PROCESSING_HINTS.some((needle) => lower.startsWith(needle));
}

export function parseToolLine(line: string): ToolLine {
  const text = line.trim();
  if (text.startsWith(ARTIFACT_MARKER)) {
    return { type: 'artifact', path: text.slice(ARTIFACT_MARKER.length).trim() };
  }
  if (text.startsWith(PROGRESS_MARKER)) {
    return { type: 'progress', event: parseTemplateProgress(text.slice(PROGRESS_MARKER.length)) };
  }
  if (text.startsWith(PROCESSING_MARKER) || hasProcessingHint(text)) {
    return { type: 'progress', event: { phase: 'processing' } };
  }
  const legacy = parseLegacyProgress(text);
  if (legacy) return { type: 'progress', event: legacy };
  return { type: 'log', text };
}
