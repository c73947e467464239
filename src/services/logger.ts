// src/services/logger.ts: structured logging for the planner backend
import { Logger } from 'tslog';

export const LOG_LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export const logger = new Logger({
  name: 'trip-planner',
  minLevel: LOG_LEVELS.indexOf('info'),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
});

/** Applies the configured level; output stays hidden under tests. */
export function configureLogger(options: { logLevel: LogLevelName; nodeEnv: string }): void {
  logger.settings.minLevel = LOG_LEVELS.indexOf(options.logLevel);
  logger.settings.type = options.nodeEnv === 'test' ? 'hidden' : 'pretty';
}
