import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, no wrapper.
 *
 * API follows pino idiom (data-first):
 *   logger.debug({ formId: 'login' }, 'Form initialised');
 *   logger.error({ err: error }, 'Rendering failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
