/**
 * Чтение тела запроса целиком в память для отладочных маршрутов.
 * Байты берутся как пришли: Content-Encoding не раскодируется, Content-Type не важен.
 * Размер тела ограничен лимитом из настроек.
 */
import type { ErrorRequestHandler, Request, RequestHandler } from 'express';
import getRawBody from 'raw-body';

const TOO_LARGE = 'entity.too.large';
const STREAM_ERROR = 'stream.error';

/**
 * Любой сбой чтения тела. type берётся из ошибки raw-body ("entity.too.large",
 * "request.aborted", "request.size.invalid"), для прочих ошибок потока это "stream.error".
 */
export class BodyReadError extends Error {
  constructor(public readonly type: string, cause?: unknown) {
    super(`request body read failed: ${type}`, { cause });
    this.name = 'BodyReadError';
  }
}

export const isBodyReadError = (err: unknown): err is BodyReadError => err instanceof BodyReadError;

const toBodyReadError = (error: unknown): BodyReadError => {
  const type =
    error instanceof Error && 'type' in error && typeof error.type === 'string' ? error.type : STREAM_ERROR;
  return new BodyReadError(type, error);
};

export const rawBody = (limit: string): RequestHandler => (req, _res, next) => {
  void getRawBody(req, { limit, length: req.headers['content-length'] }).then(
    (body) => {
      req.body = body;
      next();
    },
    (error: unknown) => {
      // Непрочитанный остаток тела сливаем, чтобы ответ дошёл до клиента.
      req.resume();
      next(toBodyReadError(error));
    },
  );
};

/**
 * Тело, прочитанное rawBody; пустой буфер, если тела не было.
 */
export const readBody = (req: Request): Buffer => (Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0));

/**
 * Сбой чтения тела: 413 для превышения лимита, иначе 500. Тело ответа пустое.
 */
export const bodyReadErrorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (!isBodyReadError(err)) {
    next(err);
    return;
  }
  console.warn(`[body] ${req.method} ${req.originalUrl}: ${err.type}`);
  res.status(err.type === TOO_LARGE ? 413 : 500).end();
};
