import type { Logger, LogLevel } from './types.js';
import { createRootLogger } from './create-logger.js';
import { loadConfig } from '../../config/app-config.js';

/**
 * Logger for code running without the DI container, e.g. a form created
 * through `createForm` directly.
 *
 * After the container is initialized, prefer the injected ILoggerFactory.
 */
let _bootstrapLogger: Logger | null = null;

/** Level from the environment; silent while the configuration is rejected. */
export function bootstrapLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  return loadConfig({ env })
    .map((config) => config.logging.level)
    .unwrapOr<LogLevel>('silent');
}

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger(bootstrapLogLevel());
  }

  return _bootstrapLogger;
}

/**
 * Create a bootstrap logger with component context.
 */
export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
