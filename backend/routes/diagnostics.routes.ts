/**
 * Таблица маршрутов: путь → ровно один обработчик. Собирается один раз при старте,
 * после этого только читается. Совпадение пути точное: регистр учитывается,
 * "/ping/" и "/ping" считаются разными путями. Метод любой.
 */
import { RequestHandler, Router } from 'express';

import * as diagnostics from '../controllers/diagnostics.controller';
import { rawBody } from '../middlewares/rawBody';
import type { PodCreator } from '../services/kubernetes.service';
import type { Storage } from '../storage/storage';

export type RouteKind = 'redirect' | 'probe' | 'version' | 'payload' | 'kubecreate';

export interface Route {
  readonly kind: RouteKind;
  readonly path: string;
  /** Цепочка Express для маршрута: при необходимости чтение тела, затем сам обработчик. */
  readonly handlers: readonly RequestHandler[];
}

export type RouteTable = ReadonlyMap<string, Route>;

export interface DiagnosticsDeps {
  storage: Storage;
  pods: PodCreator;
  /** Лимит тела для /payload и /kubecreate в формате bytes ("1mb", "512kb"). */
  bodyLimit: string;
}

export const buildRouteTable = ({ storage, pods, bodyLimit }: DiagnosticsDeps): RouteTable => {
  const readBody = rawBody(bodyLimit);
  const routes: Route[] = [
    { kind: 'redirect', path: '/', handlers: [diagnostics.redirectToPing] },
    { kind: 'probe', path: diagnostics.PING_PATH, handlers: [diagnostics.ping(storage)] },
    { kind: 'version', path: '/version', handlers: [diagnostics.version] },
    { kind: 'payload', path: '/payload', handlers: [readBody, diagnostics.payload] },
    { kind: 'kubecreate', path: '/kubecreate', handlers: [readBody, diagnostics.kubeCreate(pods)] },
  ];

  const table = new Map<string, Route>();
  for (const route of routes) {
    if (table.has(route.path)) {
      throw new Error(`duplicate route: ${route.path}`);
    }
    table.set(route.path, Object.freeze({ ...route, handlers: Object.freeze([...route.handlers]) }));
  }
  return table;
};

/**
 * Переносит таблицу в express.Router. Всё, что не совпало, уходит дальше по цепочке
 * приложения (в 404).
 */
export const createDiagnosticsRouter = (table: RouteTable): Router => {
  const router = Router({ caseSensitive: true, strict: true });
  for (const route of table.values()) {
    router.all(route.path, ...route.handlers);
  }
  return router;
};

export default createDiagnosticsRouter;
