import pino, { type Logger, type LoggerOptions } from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';

const errorSerializer = (error: unknown): Record<string, unknown> => {
  if (error instanceof Error) {
    return {
      type: error.constructor.name,
      message: error.message,
      stack: error.stack,
      ...Object.fromEntries(Object.entries(error)),
    };
  }
  return { value: error };
};

const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? 'info',
  serializers: {
    err: errorSerializer,
    error: errorSerializer,
  },
  formatters: {
    level(label) {
      return { level: label };
    },
    bindings(bindings) {
      return {
        pid: bindings.pid,
        hostname: bindings.hostname,
      };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(isDevelopment
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss.l',
            ignore: 'pid,hostname',
            singleLine: false,
          },
        },
      }
    : {}),
};

const rootLogger: Logger = pino(baseOptions);

type ModuleName =
  | 'discovery'
  | 'validation'
  | 'pipeline'
  | 'scheduler'
  | 'delivery'
  | 'server';

const childLoggerCache = new Map<string, Logger>();

/**
 * Creates or retrieves a cached child logger for a specific module.
 * Child loggers automatically include the module name in all log output.
 */
export function getLogger(module: ModuleName, bindings?: Record<string, unknown>): Logger {
  const cacheKey = bindings ? `${module}:${JSON.stringify(bindings)}` : module;

  const cached = childLoggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const child = rootLogger.child({ module, ...bindings });
  childLoggerCache.set(cacheKey, child);
  return child;
}

/**
 * Creates a child logger bound to a single pipeline run so every line
 * of that run can be correlated.
 */
export function getRunLogger(module: ModuleName, runId: string): Logger {
  return rootLogger.child({ module, runId });
}

export { rootLogger as logger };
export type { Logger };
