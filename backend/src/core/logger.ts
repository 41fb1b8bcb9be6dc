/**
 * Structured logging (pino).
 *
 * One root logger per process; modules take a child bound to `{ module }`
 * and log pino-style: `log.info({ seriesKey }, 'message')`.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const rootLogger: Logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'macro-narrative' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function configureLogger(level: LogLevel): Logger {
  rootLogger.level = level;
  return rootLogger;
}

export function getLogger(): Logger {
  return rootLogger;
}

export function moduleLogger(module: string, parent: Logger = rootLogger): Logger {
  return parent.child({ module });
}

/** Logger that drops everything. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
