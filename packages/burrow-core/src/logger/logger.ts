import pino from 'pino';

export interface LoggerOptions {
  level?: string;
}

/**
 * Logger factory - creates structured logger instances
 */
export function createLogger(serviceName: string, options: LoggerOptions = {}) {
  return pino({
    name: serviceName,
    level: options.level || process.env.LOG_LEVEL || 'info',
    formatters: {
      level: (label) => {
        return { level: label };
      }
    },
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export type Logger = ReturnType<typeof createLogger>;
