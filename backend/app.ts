/**
 * Конфигурация Express-приложения.
 * Здесь собираются журнал запросов, таблица диагностических маршрутов и обработка ошибок,
 * чтобы точка входа (index.ts) оставалась минимальной. Зависимости передаются явно:
 * одно и то же приложение поднимается и в index.ts, и в тестах с фейками.
 */
import express, { Application, ErrorRequestHandler, Request, Response } from 'express';

import { bodyReadErrorHandler } from './middlewares/rawBody';
import { LogLine, requestLogger } from './middlewares/requestLogger';
import { buildRouteTable, createDiagnosticsRouter, DiagnosticsDeps } from './routes/diagnostics.routes';

export interface AppDeps extends DiagnosticsDeps {
  /** Куда писать журнал запросов; по умолчанию console.log. */
  log?: LogLine;
}

const statusOf = (err: unknown): number => {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
};

/**
 * Централизованный обработчик ошибок: ловит исключения и обеспечивает предсказуемый ответ.
 */
const apiErrorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  console.error('API error:', err);
  const message = err instanceof Error && err.message ? err.message : 'Internal Server Error';
  res.status(statusOf(err)).json({ error: message });
};

export const createApp = (deps: AppDeps): Application => {
  const app: Application = express();

  /**
   * Ответы уходят ровно такими, какими их написал обработчик: без ETag и X-Powered-By.
   */
  app.set('etag', false);
  app.disable('x-powered-by');

  /**
   * Журнал стоит первым, чтобы видеть и 404, и ошибки.
   */
  app.use(requestLogger(deps.log));

  app.use(createDiagnosticsRouter(buildRouteTable(deps)));

  /**
   * Обработка 404: ни один маршрут таблицы не совпал.
   */
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(bodyReadErrorHandler);
  app.use(apiErrorHandler);

  return app;
};

export default createApp;
