/**
 * Контроллеры диагностических маршрутов. Каждый обработчик сам доводит ответ до конца:
 * выставляет статус и пишет тело в text/plain. Зависимости (хранилище, создатель подов)
 * приходят аргументами фабрик, глобального состояния нет.
 */
import type { Request, RequestHandler, Response } from 'express';

import { readBody } from '../middlewares/rawBody';
import type { PodCreator } from '../services/kubernetes.service';
import type { Storage } from '../storage/storage';
import asyncH from '../utils/asyncH';
import { versionLine } from '../utils/appInfo';

export const PING_PATH = '/ping';

/**
 * Снимок запроса для /payload: живёт только на время одного вызова.
 */
export interface RequestSnapshot {
  method: string;
  /** Пары имя/значение в порядке получения; повторяющиеся заголовки не склеиваются. */
  headers: Array<[name: string, value: string]>;
  body: Buffer;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Пишет ответ через res.end, минуя res.send: никаких ETag и 304 по условным заголовкам,
 * статус и тело ровно те, что выбрал обработчик.
 */
const sendText = (res: Response, status: number, body: string | Buffer): void => {
  res.status(status).type('text/plain');
  res.end(body);
};

/**
 * rawHeaders хранит заголовки плоским списком [имя, значение, имя, значение, ...]
 * ровно так, как они пришли по сети.
 */
export const snapshotRequest = (req: Request): RequestSnapshot => {
  const headers: Array<[string, string]> = [];
  for (let i = 0; i + 1 < req.rawHeaders.length; i += 2) {
    headers.push([req.rawHeaders[i], req.rawHeaders[i + 1]]);
  }
  return { method: req.method, headers, body: readBody(req) };
};

/**
 * Текстовый дамп снимка. Байты тела идут как есть, без проверки кодировки.
 */
export const renderSnapshot = ({ method, headers, body }: RequestSnapshot): Buffer => {
  let head = `Method: ${method}\n`;
  if (headers.length > 0) {
    head += 'Headers:\n';
    for (const [name, value] of headers) {
      head += `${name}: ${value}\n`;
    }
  }
  head += 'Payload: ';
  return Buffer.concat([Buffer.from(head, 'utf8'), body]);
};

/**
 * ANY / — перенаправление на пробу (303 See Other).
 */
export const redirectToPing: RequestHandler = (_req, res) => {
  res.redirect(303, PING_PATH);
};

/**
 * ANY /ping — проба хранилища. Ошибка хранилища отдаётся как есть со статусом 500.
 */
export const ping = (storage: Storage): RequestHandler =>
  asyncH(async (_req, res) => {
    let result: string;
    try {
      result = await storage.ping();
    } catch (error) {
      sendText(res, 500, errorMessage(error));
      return;
    }
    sendText(res, 200, `${result}\n`);
  });

/**
 * ANY /version
 */
export const version: RequestHandler = (_req, res) => {
  sendText(res, 200, `${versionLine()}\n`);
};

/**
 * ANY /payload — отладочный дамп запроса: метод, заголовки, тело.
 * Тот же дамп уходит в лог.
 */
export const payload: RequestHandler = (req, res) => {
  const snapshot = snapshotRequest(req);
  const dump = renderSnapshot(snapshot);
  console.log(dump.toString('utf8'));
  sendText(res, 200, dump);
};

/**
 * ANY /kubecreate — создаёт под через PodCreator. Тело запроса уже прочитано
 * rawBody и не используется. Сбой создания пода отдаётся как 500, а не как успех.
 */
export const kubeCreate = (pods: PodCreator): RequestHandler =>
  asyncH(async (_req, res) => {
    let result: string;
    try {
      result = await pods.createPod();
    } catch (error) {
      console.error('kubeCreate error:', error);
      sendText(res, 500, `Pod creation failed: ${errorMessage(error)}`);
      return;
    }
    sendText(res, 200, `Pods: ${result}`);
  });
