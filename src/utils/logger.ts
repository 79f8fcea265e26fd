/**
 * Pino logger configuration
 */

import pino from 'pino';
import { config } from '../config/index.js';

export const logger = pino({
  level: config.logLevel,
  transport:
    config.isProduction || config.isTest
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },
});

/**
 * Child logger for engine and service modules.
 * The HTTP layer binds `controller` or `middleware` instead.
 */
export function createChildLogger(service: string) {
  return logger.child({ service });
}
