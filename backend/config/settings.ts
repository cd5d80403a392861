/**
 * Итоговые настройки процесса. Каждое значение берётся из флага командной строки,
 * затем из переменной окружения, затем из значения по умолчанию.
 * Остальной код получает уже разрешённые значения и process.env сам не читает.
 */
import { parseArgs } from 'node:util';

import { HostPort, parseHostPort } from '../utils/address';

export interface Settings {
  listen: string;
  redis: string;
  bodyLimit: string;
  kubeNamespace: string;
  kubeImage: string;
}

export interface ResolvedSettings extends Settings {
  listenAddress: HostPort;
  redisAddress: HostPort;
}

type Env = Record<string, string | undefined>;

interface SettingSource {
  flag: string;
  env: string;
  fallback: string;
}

export const SETTING_SOURCES = {
  listen: { flag: 'listen', env: 'SIMPLE_WEBSERVER_LISTEN', fallback: ':8082' },
  redis: { flag: 'redis', env: 'SIMPLE_WEBSERVER_REDIS', fallback: ':6379' },
  bodyLimit: { flag: 'body-limit', env: 'SIMPLE_WEBSERVER_BODY_LIMIT', fallback: '1mb' },
  kubeNamespace: { flag: 'kube-namespace', env: 'SIMPLE_WEBSERVER_KUBE_NAMESPACE', fallback: 'default' },
  kubeImage: { flag: 'kube-image', env: 'SIMPLE_WEBSERVER_KUBE_IMAGE', fallback: 'nginx:alpine' },
} satisfies Record<keyof Settings, SettingSource>;

/**
 * Значение переменной окружения или fallback, если переменная не задана или пустая.
 */
export const envOrDefault = (env: Env, name: string, fallback: string): string => {
  const value = env[name];
  return value !== undefined && value !== '' ? value : fallback;
};

const pick = (flags: Record<string, string | undefined>, env: Env, source: SettingSource): string =>
  flags[source.flag] ?? envOrDefault(env, source.env, source.fallback);

/**
 * Разбирает argv (без node и пути к скрипту) и окружение. Неизвестный флаг или
 * кривой адрес считаются ошибкой запуска и бросаются наружу.
 */
export const resolveSettings = (
  argv: readonly string[] = process.argv.slice(2),
  env: Env = process.env,
): ResolvedSettings => {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      listen: { type: 'string' },
      redis: { type: 'string' },
      'body-limit': { type: 'string' },
      'kube-namespace': { type: 'string' },
      'kube-image': { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  });

  const settings: Settings = {
    listen: pick(values, env, SETTING_SOURCES.listen),
    redis: pick(values, env, SETTING_SOURCES.redis),
    bodyLimit: pick(values, env, SETTING_SOURCES.bodyLimit),
    kubeNamespace: pick(values, env, SETTING_SOURCES.kubeNamespace),
    kubeImage: pick(values, env, SETTING_SOURCES.kubeImage),
  };

  return {
    ...settings,
    listenAddress: parseHostPort(settings.listen),
    redisAddress: parseHostPort(settings.redis),
  };
};
