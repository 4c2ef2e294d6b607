/**
 * Boundary Validation Helpers
 *
 * A form result leaves the untyped value algebra here.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { z } from 'zod';
import type { ResultSchemaMismatchError } from './app-error.js';
import { Err } from './factories.js';

/**
 * Validate a form result (value algebra → typed caller boundary).
 */
export function validateFormResult<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  formId: string
): Result<T, ResultSchemaMismatchError> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.errors.map((e) =>
      e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message
    );
    return err(Err.resultSchemaMismatch(formId, issues));
  }
  return ok(result.data);
}
