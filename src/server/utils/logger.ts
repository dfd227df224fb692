import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

export type { Logger };

/**
 * AsyncLocalStorage for run context (run ID, data source ID, etc.)
 */
export const runContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current run context
 */
export function getRunContext(): Record<string, unknown> {
  return runContext.getStore() || {};
}

const LOG_LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLogLevel(nodeEnv: string): pino.LevelWithSilent {
  const requested = process.env.LOG_LEVEL?.toLowerCase();
  const fromEnv = LOG_LEVELS.find((level) => level === requested);
  if (fromEnv) {
    return fromEnv;
  }
  if (nodeEnv === 'test') {
    return 'silent';
  }
  return nodeEnv === 'production' ? 'info' : 'debug';
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  return pino({
    level: resolveLogLevel(nodeEnv),
    base: {
      env: nodeEnv,
      service: 'basecamp-connector',
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
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getRunContext(), ...additionalContext };
  return logger.child(context);
}
