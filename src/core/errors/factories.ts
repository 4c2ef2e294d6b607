/**
 * Error Factories - Consistent Error Construction
 *
 * Err namespace for all data error constructors.
 */

import type {
  AppError,
  ConfigInvalidError,
  ConfigIssue,
  FormHasErrorsError,
  FormNotSubmittedError,
  FormSubmittedSuccessfullyError,
  InvalidFormIdError,
  MissingInputError,
  ResultNotValueError,
  ResultSchemaMismatchError,
} from './app-error.js';

export const Err = {
  // ==========================================================================
  // Submission Errors
  // ==========================================================================

  formNotSubmitted: (formId: string): FormNotSubmittedError => ({
    _tag: 'FormNotSubmitted',
    formId,
    message: `Form "${formId}" was not submitted`,
  }),

  formHasErrors: (formId: string, reason: string): FormHasErrorsError => ({
    _tag: 'FormHasErrors',
    formId,
    reason,
    message: `Form "${formId}" was submitted with errors: ${reason}`,
  }),

  formSubmittedSuccessfully: (formId: string): FormSubmittedSuccessfullyError => ({
    _tag: 'FormSubmittedSuccessfully',
    formId,
    message: `Form "${formId}" was submitted successfully and has no error`,
  }),

  resultNotValue: (formId: string): ResultNotValueError => ({
    _tag: 'ResultNotValue',
    formId,
    message: `Form "${formId}" evaluated to a function, not a value`,
  }),

  missingInput: (field: string): MissingInputError => ({
    _tag: 'MissingInput',
    field,
    message: `Input "${field}" is missing from the submission`,
  }),

  // ==========================================================================
  // Data Errors
  // ==========================================================================

  resultSchemaMismatch: (formId: string, issues: readonly string[]): ResultSchemaMismatchError => ({
    _tag: 'ResultSchemaMismatch',
    formId,
    issues,
    message: `Result of form "${formId}" does not match the expected shape: ${issues.join('; ')}`,
  }),

  // ==========================================================================
  // Configuration Errors
  // ==========================================================================

  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  invalidFormId: (id: string): InvalidFormIdError => ({
    _tag: 'InvalidFormId',
    id,
    message: `"${id}" can not be used as form id. Start with a letter, then use letters, digits or underscores.`,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
