import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for search context (keyword, run ID, etc.)
 */
export const searchContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current search context
 */
export function getSearchContext(): Record<string, unknown> {
  return searchContext.getStore() || {};
}

function isLevel(value: string): value is pino.LevelWithSilent {
  return value === 'silent' || Object.prototype.hasOwnProperty.call(pino.levels.values, value);
}

function resolveLevel(isDevelopment: boolean, isTest: boolean): pino.LevelWithSilent {
  const configured = process.env.LOG_LEVEL;
  if (configured && isLevel(configured)) {
    return configured;
  }
  if (isTest) return 'silent';
  return isDevelopment ? 'debug' : 'info';
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const isTest = process.env.NODE_ENV === 'test';
  const isDevelopment = process.env.NODE_ENV !== 'production' && !isTest;
  const baseLogger = pino({
    level: resolveLevel(isDevelopment, isTest),
    base: {
      env: process.env.NODE_ENV || 'development',
      service: 'docsearch',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,env,service',
        },
      },
    }),
  });

  return baseLogger.child(getSearchContext());
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getSearchContext(), ...additionalContext };
  return logger.child(context);
}
