import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type is pino's own; no wrapper.
 *
 * Data-first calls:
 *   logger.debug({ variable: 'GOPATH' }, 'Appended workspace');
 *   logger.warn({ err }, 'Environment resolution failed');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger bound to `{ component }` */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];
