import type { Request, Response, NextFunction } from 'express';
import { isExtractionError, type ExtractionErrorCode } from '../core/errors.js';
import { HttpError, isHttpError } from '../core/httpError.js';
import { getLogger } from '../core/logger.js';

const log = getLogger('http');

const EXTRACTION_STATUS: Record<ExtractionErrorCode, number> = {
  InvalidUrl: 400,
  Unsupported: 422,
  AuthRequired: 403,
  ExtractionBlocked: 403,
  NetworkError: 504,
  TranscodeError: 500,
  EmptyResult: 502,
  Cancelled: 409,
  ToolMissing: 500,
  Internal: 500,
};

export function extractionStatus(code: ExtractionErrorCode): number {
  return EXTRACTION_STATUS[code];
}

/** Express JSON body errors carry these. */
function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return err instanceof Error && 'status' in err && typeof err.status === 'number' && 'type' in err;
}

function normalizeError(err: unknown): HttpError {
  if (isHttpError(err)) return err;
  if (isExtractionError(err)) return new HttpError(extractionStatus(err.code), err.code, err.message);
  if (isBodyParserError(err) && err.status < 500) {
    const code = err.status === 413 ? 'PAYLOAD_TOO_LARGE' : 'INVALID_INPUT';
    return new HttpError(err.status, code, err.status === 413 ? 'Request body too large' : 'Malformed request body');
  }
  return new HttpError(500, 'INTERNAL_ERROR', 'Unexpected server error');
}

// Express recognises error middleware by its four parameters.
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  void _next;
  const normalized = normalizeError(err);
  if (normalized.status >= 500) {
    log.error('request_failed', { method: req.method, path: req.path, requestId: res.locals.requestId, error: err });
  }
  if (res.headersSent) {
    res.end();
    return;
  }
  res.status(normalized.status).json({
    error: normalized.message,
    code: normalized.code,
    ...(normalized.details ?? {}),
  });
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({ error: `Not found: ${req.method} ${req.path}`, code: 'NOT_FOUND' });
}
