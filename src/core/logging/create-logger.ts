import 'reflect-metadata';
import pino from 'pino';
import type { DestinationStream } from 'pino';
import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { AppConfig } from '../../config/app-config.js';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Create the root pino logger instance.
 *
 * - Sync output to stderr, stdout belongs to the host application
 * - JSON format for machine parsing
 * - Raw form input is redacted
 */
export function createRootLogger(level: LogLevel, destination?: DestinationStream): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    destination ?? pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers.
 *
 * Injectable factory, singleton lifecycle. The level comes from AppConfig.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Config.App) config: AppConfig) {
    this._root = createRootLogger(config.logging.level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
