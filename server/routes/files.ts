import type { Express, NextFunction, Request, Response } from 'express';
import { isSafeFileName, listCompletedFiles, resolveCompletedFile } from '../core/completedFiles.js';
import { HttpError } from '../core/httpError.js';
import { setNoStore } from '../core/http.js';
import type { Logger } from '../core/logger.js';
import { wrap } from '../core/wrap.js';

export type FileDeps = {
  downloadDir: string;
  listLimit: number;
  log: Logger;
};

export function setupFileRoutes(app: Express, deps: FileDeps) {
  const { downloadDir, listLimit, log } = deps;

  app.get(
    '/downloads',
    wrap(async (_req: Request, res: Response) => {
      const files = await listCompletedFiles(downloadDir, listLimit);
      setNoStore(res);
      res.json({ files });
    }),
  );

  app.get(
    '/file/:name',
    wrap(async (req: Request, res: Response, next: NextFunction) => {
      const { name } = req.params;
      if (!isSafeFileName(name)) throw new HttpError(400, 'INVALID_INPUT', 'Invalid file name');
      const full = await resolveCompletedFile(downloadDir, name);
      if (!full) throw new HttpError(404, 'NOT_FOUND', 'File not found');
      setNoStore(res);
      res.download(full, name, (err) => {
        if (!err) return;
        if (res.headersSent) log.warn('file_send_interrupted', { name, error: err.message });
        else next(err);
      });
    }),
  );
}
