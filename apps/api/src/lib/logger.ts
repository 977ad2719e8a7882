import pino from 'pino';
import { env } from '../config';

/**
 * Structured JSON logger shared by the services, the job and the HTTP layer.
 */
export const logger = pino({
  level: env.LOG_LEVEL,
  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(env.NODE_ENV === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  }),
});

/**
 * Create a child logger bound to a component, e.g. `{ service: 'price-oracle' }`
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export type Logger = pino.Logger;
