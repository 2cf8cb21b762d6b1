/**
 * Failure taxonomy of the extraction tool and its translation from raw stderr.
 */

export type ExtractionErrorCode =
  | 'InvalidUrl'
  | 'Unsupported'
  | 'NetworkError'
  | 'AuthRequired'
  | 'ExtractionBlocked'
  | 'TranscodeError'
  | 'EmptyResult'
  | 'Cancelled'
  | 'ToolMissing'
  | 'Internal';

export type ExtractionStage = 'probe' | 'fetch';

export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;

  constructor(code: ExtractionErrorCode, message: string) {
    super(message);
    this.name = 'ExtractionError';
    this.code = code;
  }
}

export function isExtractionError(err: unknown): err is ExtractionError {
  return err instanceof ExtractionError;
}

export const EMPTY_RESULT_MESSAGE =
  'The download finished but produced an empty file. The site is most likely blocking downloads; ' +
  'try again with browser cookies selected, or update yt-dlp.';

export const CANCELLED_MESSAGE = 'Download cancelled';

const AUTH_PATTERNS =
  /sign in to confirm|please sign in|login required|log in|cookies (?:are|is) (?:required|needed)|use --cookies|private video|members[- ]only|HTTP Error 40[13]|\b40[13]\b.*forbidden|forbidden|unauthorized|not available in your country|geo[- ]?restrict|confirm you(?:'|’)?re not a bot|captcha|unusual traffic/i;

const INVALID_URL_PATTERNS = /is not a valid URL|Invalid URL|unknown url type/i;

const UNSUPPORTED_PATTERNS = /Unsupported URL|No video formats found|Requested format is not available|no such format/i;

const TRANSCODE_PATTERNS = /Postprocessing|ffmpeg|ffprobe|Conversion failed|Error opening output|audio conversion failed/i;

const NETWORK_PATTERNS =
  /timed out|ETIMEDOUT|ECONNRESET|ECONNREFUSED|ENETUNREACH|EHOSTUNREACH|Network is unreachable|getaddrinfo|Name or service not known|Temporary failure in name resolution|Unable to download webpage|Connection reset|Read timed out|HTTP Error 5\d\d/i;

function lastMeaningfulLine(raw: string): string {
  const lines = raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
  const errorLine = [...lines].reverse().find((line) => /^ERROR:/i.test(line));
  const detail = (errorLine ?? lines[lines.length - 1] ?? '').replace(/^ERROR:\s*/i, '');
  return detail.replace(/https?:\/\/[\w./?&=%+#:~-]+/gi, '[url]');
}

/**
 * Classify tool output into an ExtractionError. Auth and geo blocks surface as
 * AuthRequired while probing and ExtractionBlocked while fetching.
 */
export function classifyToolFailure(raw: string, stage: ExtractionStage): ExtractionError {
  const text = String(raw || '');
  const detail = lastMeaningfulLine(text);
  const suffix = detail ? `: ${detail}` : '';

  if (/spawn .*ENOENT|ENOENT.*spawn|command not found/i.test(text)) {
    return new ExtractionError('ToolMissing', 'yt-dlp was not found on the server');
  }
  if (INVALID_URL_PATTERNS.test(text)) {
    return new ExtractionError('InvalidUrl', `Invalid URL${suffix}`);
  }
  if (UNSUPPORTED_PATTERNS.test(text)) {
    return new ExtractionError('Unsupported', `Unsupported source or format${suffix}`);
  }
  if (AUTH_PATTERNS.test(text)) {
    return stage === 'probe'
      ? new ExtractionError('AuthRequired', `Authentication required or access blocked${suffix}`)
      : new ExtractionError(
          'ExtractionBlocked',
          `Download blocked by the site (authentication or region restriction)${suffix}`,
        );
  }
  if (TRANSCODE_PATTERNS.test(text)) {
    return new ExtractionError('TranscodeError', `Post-processing failed${suffix}`);
  }
  if (NETWORK_PATTERNS.test(text)) {
    return new ExtractionError('NetworkError', `Network error${suffix}`);
  }
  return new ExtractionError('Internal', detail ? `Extractor error: ${detail}` : 'Extractor error');
}

/**
 * Any thrown value as an ExtractionError; unknown failures become Internal.
 */
export function toExtractionError(err: unknown): ExtractionError {
  if (isExtractionError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ExtractionError('Internal', message ? `Internal error: ${message}` : 'Internal error');
}
