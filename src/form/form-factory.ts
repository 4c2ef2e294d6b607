import 'reflect-metadata';
import type { Result } from 'neverthrow';
import { inject, singleton } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { AppConfig } from '../config/app-config.js';
import type { InvalidFormIdError } from '../core/errors/index.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import type { CreateFormOptions, Form } from './form.js';
import { createForm } from './form.js';

export type FormOptions = Omit<CreateFormOptions, 'logger'>;

/**
 * Creates forms with the configured method and a logger per form.
 */
@singleton()
export class FormFactory {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Logging.Factory) loggers: ILoggerFactory,
    @inject(DI.Config.App) private readonly config: AppConfig
  ) {
    this.logger = loggers.create('Form');
  }

  create(options: FormOptions): Result<Form, InvalidFormIdError> {
    return createForm({
      ...options,
      method: options.method ?? this.config.forms.method,
      logger: this.logger.child({ formId: options.id }),
    });
  }
}
