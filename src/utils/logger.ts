/**
 * Logging configuration using Pino.
 */

import pino from 'pino';
import type { LoggerOptions } from 'pino';
// .env has to be loaded before LOG_LEVEL is read
import '../config.js';

const level = (process.env.LOG_LEVEL ?? 'INFO').toLowerCase();
const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

/**
 * Shared options, also handed to Fastify.
 */
export const loggerConfig = {
  level,
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
} satisfies LoggerOptions;

/**
 * Global logger instance configured with environment settings.
 */
export const logger = pino(loggerConfig);

export type { Logger } from 'pino';
