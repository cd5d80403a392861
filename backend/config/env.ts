/**
 * Ранний бутстрап переменных окружения перед запуском остального кода.
 * Вне production подгружаем .env, .env.local, .env.<NODE_ENV> через dotenv-flow;
 * значения, уже выставленные в process.env, не перетираются.
 */
import { config as loadDotenvFlow } from 'dotenv-flow';

if (process.env.NODE_ENV !== 'production') {
  try {
    loadDotenvFlow({ silent: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    // eslint-disable-next-line no-console
    console.warn('[dotenv-flow] skipped:', message);
  }
}

export {};
