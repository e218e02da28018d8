import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport:
    isProduction || isTest
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
            translateTime: 'SYS:standard',
          },
        },
});

/**
 * Log de-dupe / rate limit
 *
 * Periodic publishers run every few seconds; while the broker is unreachable each skipped cycle
 * would otherwise log the same warning.
 *
 * How to use:
 * - Provide a stable key (e.g. "publisher:telemetry:skip") and a window in ms.
 * - The first call logs; subsequent calls within the window are suppressed.
 */
const lastLogAtByKey = new Map<string, number>();
const shouldLog = (key: string, windowMs: number) => {
  const now = Date.now();
  const last = lastLogAtByKey.get(key);
  if (last !== undefined && now - last < windowMs) return false;
  lastLogAtByKey.set(key, now);
  return true;
};

export const logInfo = (message: string, ...optionalParams: unknown[]) => {
  logger.info(message, ...optionalParams);
};
export const logDebug = (message: string, ...optionalParams: unknown[]) => {
  logger.debug(message, ...optionalParams);
};
export const logWarn = (message: string, ...optionalParams: unknown[]) => {
  logger.warn(message, ...optionalParams);
};
export const logError = (message: string, ...optionalParams: unknown[]) => {
  logger.error(message, ...optionalParams);
};

export const logWarnDedup = (key: string, windowMs: number, message: string, ...optionalParams: unknown[]) => {
  if (!shouldLog(key, windowMs)) return;
  logWarn(message, ...optionalParams);
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export default logger;
