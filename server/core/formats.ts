/**
 * Format choices offered to clients and the yt-dlp flags behind each one.
 * The selector strings are handed to the tool untouched; fallback between
 * streams is the tool's business.
 */

export const FORMAT_CHOICES = ['best', '1080p', '720p', '480p', '360p', 'audio', 'mp3', 'flac'] as const;

export type FormatChoice = (typeof FORMAT_CHOICES)[number];

export const DEFAULT_FORMAT: FormatChoice = 'best';

const progressive = (height: number) =>
  `best[height<=${height}][ext=mp4]/best[height<=${height}]/best`;

const FORMAT_ARGS: Record<FormatChoice, string[]> = {
  best: ['-f', 'best[ext=mp4]/best'],
  '1080p': ['-f', progressive(1080)],
  '720p': ['-f', progressive(720)],
  '480p': ['-f', progressive(480)],
  '360p': ['-f', progressive(360)],
  audio: ['-f', 'bestaudio/best', '-x', '--audio-format', 'mp3', '--audio-quality', '192K'],
  mp3: ['-f', 'bestaudio/best', '-x', '--audio-format', 'mp3', '--audio-quality', '192K'],
  flac: ['-f', 'bestaudio/best', '-x', '--audio-format', 'flac'],
};

export function isFormatChoice(value: string): value is FormatChoice {
  return (FORMAT_CHOICES as readonly string[]).includes(value);
}

export function formatArgs(choice: FormatChoice): string[] {
  return [...FORMAT_ARGS[choice]];
}

export function isAudioOnly(choice: FormatChoice): boolean {
  return choice === 'audio' || choice === 'mp3' || choice === 'flac';
}
