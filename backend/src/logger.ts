/**
 * Structured Logger v1.0.0
 *
 * Pino-based structured JSON logging.
 * - Development: pretty-printed, colorized (pino-pretty)
 * - Production: JSON lines (machine-parseable)
 * - Tests: silent unless LOG_LEVEL is set
 *
 * Usage:
 *   import { logger } from './logger';
 *   logger.info({ accountId, amount }, 'XP earned');
 *
 * Child loggers for subsystems:
 *   const log = logger.child({ module: 'ledger-audit' });
 */

import pino from 'pino';
import { config } from './config';

function defaultLevel(): string {
  if (config.app.isTest) return 'silent';
  return config.app.isDevelopment ? 'debug' : 'info';
}

export const logger = pino({
  level: process.env.LOG_LEVEL || defaultLevel(),

  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'password',
      'token',
      'secret',
      'databaseUrl',
    ],
    censor: '[REDACTED]',
  },

  base: {
    service: 'xp-economy-api',
    env: config.app.env,
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  transport: config.app.isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service,env',
        },
      }
    : undefined,
});

/**
 * Pre-built child loggers for major subsystems.
 */
export const ledgerLogger = logger.child({ module: 'ledger' });
export const quizLogger = logger.child({ module: 'quiz' });
export const socialLogger = logger.child({ module: 'social' });
export const storeLogger = logger.child({ module: 'feature-store' });
export const monitorLogger = logger.child({ module: 'monitor' });
export const workerLogger = logger.child({ module: 'worker' });
export const dbLogger = logger.child({ module: 'db' });
