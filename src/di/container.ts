import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { DI } from './tokens.js';
import type { AppConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../core/errors/app-error.js';
import { formatErrorForLogs } from '../core/errors/formatter.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import { FormFactory } from '../form/form-factory.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  /** Environment to read configuration from. Defaults to process.env. */
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<void, ConfigInvalidError> {
  // Tests may register a config before initialization; keep it.
  if (container.isRegistered(DI.Config.App)) {
    return ok(undefined);
  }

  const configResult = loadConfig({ env: options.env ?? process.env });
  if (configResult.isErr()) {
    createBootstrapLogger('container').error(formatErrorForLogs(configResult.error), 'Configuration rejected');
    return err(configResult.error);
  }

  container.register<AppConfig>(DI.Config.App, { useValue: configResult.value });
  return ok(undefined);
}

function registerServices(): void {
  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });
  container.register<FormFactory>(DI.Forms.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(FormFactory)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the container. Idempotent; a rejected configuration leaves the
 * container uninitialized so a corrected environment can be retried.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<DependencyContainer, ConfigInvalidError> {
  if (initialized) {
    return ok(container);
  }

  return registerConfig(options).map(() => {
    registerServices();
    initialized = true;
    return container;
  });
}

export function isInitialized(): boolean {
  return initialized;
}

/**
 * Clear every registration. Tests only.
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export { container };
