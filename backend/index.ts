/**
 * Точка входа: окружение → настройки → зависимости → HTTP-сервер.
 */
import './config/env';

import type { Server } from 'node:http';

import createApp from './app';
import { resolveSettings } from './config/settings';
import { createKubernetesPodCreator } from './services/kubernetes.service';
import { RedisStorage } from './storage/redis.storage';

const settings = resolveSettings();

const storage = new RedisStorage(settings.redisAddress);
const pods = createKubernetesPodCreator({
  namespace: settings.kubeNamespace,
  image: settings.kubeImage,
});

const app = createApp({ storage, pods, bodyLimit: settings.bodyLimit });

console.log(`Starting webserver and listen on ${settings.listen}`);

const { host, port } = settings.listenAddress;
const server: Server = host ? app.listen(port, host) : app.listen(port);

server.on('error', (error) => {
  console.error('HTTP server failed:', error);
  process.exit(1);
});

const shutdown = (signal: NodeJS.Signals): void => {
  console.log(`${signal} received, shutting down`);
  server.close((closeError) => {
    if (closeError) {
      console.error('HTTP server close failed:', closeError);
    }
    void storage
      .close()
      .catch((error: unknown) => {
        console.error('Redis close failed:', error);
      })
      .finally(() => {
        process.exit(closeError ? 1 : 0);
      });
  });
};

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
