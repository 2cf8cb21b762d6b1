import type { Response } from 'express';

/**
 * Set no-cache headers (HTTP/1.0 and HTTP/1.1 compatible)
 */
export const setNoStore = (res: Response): void => {
  res.setHeader('Cache-Control', 'no-store');
  res.setHeader('Pragma', 'no-cache');
};
