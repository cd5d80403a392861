/**
 * Реализация Storage поверх Redis (ioredis).
 * Одно соединение на процесс: ioredis мультиплексирует команды по нему,
 * поэтому параллельные ping() безопасны. Соединение открывается лениво при первой пробе
 * и переоткрывается следующей пробой, если было потеряно. Своих повторов адаптер не делает.
 */
import { Redis } from 'ioredis';

import type { HostPort } from '../utils/address';
import type { ClosableStorage } from './storage';

const DEFAULT_HOST = 'localhost';

export class RedisStorage implements ClosableStorage {
  private readonly client: Redis;

  /** host:port для сообщений об ошибках. */
  private readonly label: string;

  /**
   * Последняя ошибка сокета. connect() и команды при обрыве отклоняются общим
   * "Connection is closed.", а настоящая причина (ECONNREFUSED, ECONNRESET) приходит событием.
   */
  private lastError: Error | null = null;

  /** Общий промис подключения: конкурентные пробы ждут одну попытку, а не запускают свои. */
  private connecting: Promise<void> | null = null;

  constructor(address: HostPort) {
    const host = address.host ?? DEFAULT_HOST;
    this.label = `${host}:${address.port}`;
    this.client = new Redis({
      host,
      port: address.port,
      lazyConnect: true,
      enableReadyCheck: false,
      // Переподключается только следующая проба, фоновых ретраев нет.
      retryStrategy: () => null,
    });

    this.client.on('error', (error: Error) => {
      this.lastError = error;
      console.warn('[redis] connection error:', error.message);
    });
  }

  async ping(): Promise<string> {
    await this.ensureConnected();
    try {
      return await this.client.ping();
    } catch (error) {
      throw this.describe(error);
    }
  }

  async close(): Promise<void> {
    if (this.client.status === 'wait' || this.client.status === 'end') {
      return;
    }
    await this.client.quit();
  }

  private ensureConnected(): Promise<void> {
    if (this.connecting) {
      return this.connecting;
    }
    const { status } = this.client;
    if (status !== 'wait' && status !== 'end') {
      return Promise.resolve();
    }

    this.lastError = null;
    this.connecting = this.client
      .connect()
      .catch((error: unknown) => {
        throw this.describe(error);
      })
      .finally(() => {
        this.connecting = null;
      });
    return this.connecting;
  }

  /**
   * Ошибка для вызывающей стороны: причина из события сокета, если она была,
   * иначе исходное сообщение с адресом бэкенда.
   */
  private describe(error: unknown): Error {
    if (this.lastError) {
      return this.lastError;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new Error(`redis ${this.label}: ${message}`);
  }
}
