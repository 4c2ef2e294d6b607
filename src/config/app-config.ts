/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { Err } from '../core/errors/factories.js';
import type { ConfigInvalidError, ConfigIssue } from '../core/errors/app-error.js';
import { LOG_LEVELS } from '../core/logging/types.js';
import type { LogLevel } from '../core/logging/types.js';

export const FORM_METHODS = ['post', 'get'] as const;

export type FormMethod = (typeof FORM_METHODS)[number];

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
  readonly forms: { readonly method: FormMethod };
}

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const lowercase = (v: unknown): unknown => (typeof v === 'string' ? v.trim().toLowerCase() : v);

const EnvSchema = z.object({
  FORMLETS_LOG_LEVEL: z.preprocess(lowercase, z.enum(LOG_LEVELS).default('silent')),
  FORMLETS_FORM_METHOD: z.preprocess(lowercase, z.enum(FORM_METHODS).default('post')),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<AppConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data));
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    logging: { level: env.FORMLETS_LOG_LEVEL },
    forms: { method: env.FORMLETS_FORM_METHOD },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
