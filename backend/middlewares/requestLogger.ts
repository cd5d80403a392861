/**
 * Журнал запросов: после завершения ответа пишет одну строку
 * "<METHOD> <path> <status> <latency>ms". Сам ответ не трогает.
 */
import type { RequestHandler } from 'express';

export type LogLine = (line: string) => void;

export const requestLogger = (log: LogLine = console.log): RequestHandler => (req, res, next) => {
  const startedAt = process.hrtime.bigint();
  let logged = false;

  const done = (): void => {
    if (logged) return;
    logged = true;
    const ms = Number(process.hrtime.bigint() - startedAt) / 1e6;
    log(`${req.method} ${req.originalUrl} ${res.statusCode} ${ms.toFixed(1)}ms`);
  };

  // finish: ответ отдан целиком; close: клиент ушёл раньше.
  res.once('finish', done);
  res.once('close', done);
  next();
};

export default requestLogger;
