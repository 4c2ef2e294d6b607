/**
 * Error Type Guards
 */

import type {
  AppError,
  ConfigurationError,
  DataError,
  SubmissionError,
} from './app-error.js';
import { ContractViolation } from './contract-violations.js';

export function isAppError(e: unknown): e is AppError {
  return typeof e === 'object' && e !== null && '_tag' in e && !(e instanceof Error);
}

export function isSubmissionError(e: AppError): e is SubmissionError {
  return e._tag === 'FormNotSubmitted'
    || e._tag === 'FormHasErrors'
    || e._tag === 'FormSubmittedSuccessfully'
    || e._tag === 'ResultNotValue'
    || e._tag === 'MissingInput';
}

export function isDataError(e: AppError): e is DataError {
  return e._tag === 'ResultSchemaMismatch';
}

export function isConfigurationError(e: AppError): e is ConfigurationError {
  return e._tag === 'ConfigInvalid' || e._tag === 'InvalidFormId';
}

/** Thrown defects in form construction, as opposed to errors-as-data. */
export function isContractViolation(e: unknown): e is ContractViolation {
  return e instanceof ContractViolation;
}
