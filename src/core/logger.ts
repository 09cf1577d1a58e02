// src/core/logger.ts
import { pino, type Logger } from 'pino';
import { DEFAULT_LOG_LEVEL, LOGGER_NAME, LOG_LEVEL_ENV } from './constants.js';

export type { Logger };

/**
 * Logger del paquete. Silencioso salvo que se defina ARCHIVE_HANDLE_LOG_LEVEL.
 */
export const logger: Logger = pino({
    name: LOGGER_NAME,
    level: process.env[LOG_LEVEL_ENV] || DEFAULT_LOG_LEVEL,
});
