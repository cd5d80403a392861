/**
 * Абстракция хранилища, через которую работает health-проба.
 * Контракт минимальный: один вызов ping(), который либо возвращает короткий
 * ответ бэкенда (например "PONG"), либо отклоняется с Error.
 * Повторов здесь нет, это забота вызывающей стороны.
 */
export interface Storage {
  ping(): Promise<string>;
}

/**
 * Хранилище, которым владеет процесс и которое нужно закрыть при остановке.
 */
export interface ClosableStorage extends Storage {
  close(): Promise<void>;
}
