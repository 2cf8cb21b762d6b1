import type { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncHandler = (req: Request, res: Response, next: NextFunction) => unknown;

/** Forward sync throws and async rejections to the Express error chain. */
export function wrap(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    let result: unknown;
    try {
      result = handler(req, res, next);
    } catch (err) {
      next(err);
      return;
    }
    if (result instanceof Promise) result.catch(next);
  };
}
