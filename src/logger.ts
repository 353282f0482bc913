// Structured logging
// One pino configuration shared by Fastify's request logger and the service-level logger

import pino from 'pino';
import type { LoggerOptions } from 'pino';
import { env } from './env.js';

export type { Logger } from 'pino';

export function loggerOptions(): LoggerOptions {
  return {
    level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
    ...(env.NODE_ENV === 'development'
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
  };
}

export const logger = pino(loggerOptions());
