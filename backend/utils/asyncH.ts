/**
 * Обёртка для async-контроллеров: отклонённый промис уходит в next(err)
 * и попадает в общий error handler из app.ts.
 * Сигнатура обычная express.RequestHandler, без any-дженериков.
 */
import type { NextFunction, Request, RequestHandler, Response } from 'express';

export type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

export function asyncH(fn: AsyncRequestHandler): RequestHandler {
  return (req, res, next) => {
    void Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export default asyncH;
