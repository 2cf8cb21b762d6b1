export class HttpError extends Error {
  status: number;
  code: string;
  details?: Record<string, unknown>;

  constructor(status: number, code: string, message?: string, details?: Record<string, unknown>) {
    super(message || code);
    this.name = 'HttpError';
    this.status = Number.isInteger(status) ? status : 500;
    this.code = code || 'INTERNAL_ERROR';
    this.details = details;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}
