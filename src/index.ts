import 'reflect-metadata';

// Value algebra
export * from './core/values/index.js';

// Rendering
export type { ErrorMap, InputMapping } from './rendering/render-dict.js';
export { RenderDict, collectErrors } from './rendering/render-dict.js';
export type {
  Builder,
  CombinedBuilder,
  ConstBuilder,
  DelegateBuilder,
  FragmentProvider,
  TagBuilder,
} from './rendering/builder.js';
export { build, buildWith, combineAll, combined, constant, delegate, tagged } from './rendering/builder.js';
export type { Attributes, Fragment } from './html/fragment.js';
export {
  AttributesSchema,
  concat,
  concatAll,
  escapeHtml,
  isFragment,
  literal,
  nothing,
  renderFragment,
  tag,
  text as textFragment,
} from './html/fragment.js';

// Formlets and forms
export * from './formlets/index.js';
export type { CreateFormOptions } from './form/form.js';
export { Form, createForm } from './form/form.js';
export type { FormOptions } from './form/form-factory.js';
export { FormFactory } from './form/form-factory.js';

// Errors, config, logging
export * from './core/errors/index.js';
export type { AppConfig, FormMethod, LoadConfigOptions } from './config/app-config.js';
export { loadConfig } from './config/app-config.js';
export type { ILoggerFactory, Logger, LogLevel } from './core/logging/index.js';
export { PinoLoggerFactory, createBootstrapLogger, getBootstrapLogger } from './core/logging/index.js';

// DI Container exports
export { container, initializeContainer, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';
