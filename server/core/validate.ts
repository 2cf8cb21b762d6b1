import { z } from 'zod';
import { HttpError } from './httpError.js';
import { DEFAULT_FORMAT, FORMAT_CHOICES } from './formats.js';

export const MAX_URL_LENGTH = 2000;

/** Trim and default a missing scheme to https. */
export function normalizeUrl(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

const HttpUrl = z
  .string({ required_error: 'Please enter a video URL', invalid_type_error: 'URL must be a string' })
  .transform(normalizeUrl)
  .pipe(
    z
      .string()
      .min(1, 'Please enter a video URL')
      .max(MAX_URL_LENGTH, 'URL too long')
      .url('Invalid URL')
      .refine((u) => /^https?:\/\//i.test(u), 'Only http/https allowed'),
  );

// BROWSER[+KEYRING][:PROFILE][::CONTAINER]; profiles may hold spaces or a path.
const Browser = z
  .string()
  .trim()
  .regex(/^(?!-)[^\p{Cc}]{1,256}$/u, 'Invalid browser selector')
  .optional()
  .default('none');

const Format = z.enum(FORMAT_CHOICES, {
  errorMap: () => ({ message: `Format must be one of: ${FORMAT_CHOICES.join(', ')}` }),
});

export const InfoBody = z.object({
  url: HttpUrl,
  browser: Browser,
});

export const DownloadBody = z.object({
  url: HttpUrl,
  format: Format.optional().default(DEFAULT_FORMAT),
  browser: Browser,
});

export type InfoBodyType = z.infer<typeof InfoBody>;
export type DownloadBodyType = z.infer<typeof DownloadBody>;

/** Parse a request body or throw a 400 carrying the first issue. */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new HttpError(400, 'INVALID_INPUT', parsed.error.issues[0]?.message ?? 'Invalid input');
  }
  return parsed.data;
}
