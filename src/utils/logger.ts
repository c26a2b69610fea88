// Shared service logger
// Request logging stays on Fastify's own pino instance; services log through child loggers of this one

import { pino, type Logger } from 'pino';

const level = process.env.NODE_ENV === 'test' ? 'silent' : process.env.LOG_LEVEL || 'info';
const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger: Logger = pino({
  level,
  ...(pretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }
    : {}),
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}

export type { Logger };
