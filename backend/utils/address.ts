/**
 * Разбор адресов вида "host:port": так задаются адрес прослушивания и адрес Redis.
 * Хост может быть пустым (":8082"), IPv6-хост пишется в квадратных скобках ("[::1]:6379").
 */

export interface HostPort {
  /** Не указан: потребитель решает сам (все интерфейсы или localhost). */
  host?: string;
  port: number;
}

const MAX_PORT = 65535;

export class AddressError extends Error {
  constructor(public readonly address: string, reason: string) {
    super(`invalid address "${address}": ${reason}`);
    this.name = 'AddressError';
  }
}

/**
 * Делит адрес по последнему двоеточию и валидирует порт.
 */
export const parseHostPort = (address: string): HostPort => {
  const raw = address.trim();
  const idx = raw.lastIndexOf(':');
  if (idx < 0) {
    throw new AddressError(address, 'missing port');
  }

  let host = raw.slice(0, idx);
  const portText = raw.slice(idx + 1);

  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }

  if (!/^\d+$/.test(portText)) {
    throw new AddressError(address, 'port must be a number');
  }
  const port = Number(portText);
  if (port > MAX_PORT) {
    throw new AddressError(address, `port must be between 0 and ${MAX_PORT}`);
  }

  return host.length > 0 ? { host, port } : { port };
};
