/**
 * Error Hierarchy - Discriminated Unions
 *
 * Expected failures around a form (no submission yet, field errors, bad setup)
 * are data. Defects in form construction are thrown, see contract-violations.ts.
 */

// ============================================================================
// Error Categories
// ============================================================================

export type AppError =
  | SubmissionError
  | DataError
  | ConfigurationError;

// ============================================================================
// Submission Errors (state of a form, not bugs)
// ============================================================================

export type SubmissionError =
  | FormNotSubmittedError
  | FormHasErrorsError
  | FormSubmittedSuccessfullyError
  | ResultNotValueError
  | MissingInputError;

export interface FormNotSubmittedError {
  readonly _tag: 'FormNotSubmitted';
  readonly formId: string;
  readonly message: string;
}

export interface FormHasErrorsError {
  readonly _tag: 'FormHasErrors';
  readonly formId: string;
  readonly reason: string;
  readonly message: string;
}

export interface FormSubmittedSuccessfullyError {
  readonly _tag: 'FormSubmittedSuccessfully';
  readonly formId: string;
  readonly message: string;
}

export interface ResultNotValueError {
  readonly _tag: 'ResultNotValue';
  readonly formId: string;
  readonly message: string;
}

export interface MissingInputError {
  readonly _tag: 'MissingInput';
  readonly field: string;
  readonly message: string;
}

// ============================================================================
// Data Errors (shape of a result)
// ============================================================================

export type DataError = ResultSchemaMismatchError;

export interface ResultSchemaMismatchError {
  readonly _tag: 'ResultSchemaMismatch';
  readonly formId: string;
  readonly issues: readonly string[];
  readonly message: string;
}

// ============================================================================
// Configuration Errors (Setup Problems)
// ============================================================================

export type ConfigurationError =
  | ConfigInvalidError
  | InvalidFormIdError;

export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

export interface ConfigInvalidError {
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}

export interface InvalidFormIdError {
  readonly _tag: 'InvalidFormId';
  readonly id: string;
  readonly message: string;
}

/** Errors a `Form` hands back from `result()`, `resultAs()` and `error()`. */
export type FormError =
  | FormNotSubmittedError
  | FormHasErrorsError
  | FormSubmittedSuccessfullyError
  | ResultNotValueError
  | ResultSchemaMismatchError;
