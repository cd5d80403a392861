/**
 * Имя и версия приложения для эндпоинта /version.
 */
export const APP_NAME = 'simple-webserver';
export const APP_VERSION = '1.0.0';

export const versionLine = (): string => `${APP_NAME} v${APP_VERSION}`;
