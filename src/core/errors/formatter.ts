/**
 * Error Formatting for humans and logs
 */

import type { AppError } from './app-error.js';
import { assertNever } from '../../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'FormNotSubmitted':
    case 'FormSubmittedSuccessfully':
    case 'ResultNotValue':
    case 'MissingInput':
    case 'InvalidFormId':
      return error.message;

    case 'FormHasErrors':
      return `${error.message}\nInspect the rendered form for per-field messages.`;

    case 'ResultSchemaMismatch':
      return `Result of form "${error.formId}" does not match the expected shape\n\n${error.issues.map((i) => `  - ${i}`).join('\n')}`;

    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    default:
      return assertNever(error);
  }
}

export function formatErrorForLogs(error: AppError): Record<string, unknown> {
  const base: Record<string, unknown> = {
    errorTag: error._tag,
    message: error.message,
  };

  for (const [key, value] of Object.entries(error)) {
    if (key !== '_tag' && key !== 'message') {
      base[key] = value;
    }
  }

  return base;
}
