import { describe, expect, it } from 'vitest';
import {
  Err,
  NotAValueError,
  formatAppError,
  formatErrorForLogs,
  isAppError,
  isConfigurationError,
  isContractViolation,
  isDataError,
  isSubmissionError,
} from '../../../src/core/errors/index.js';

describe('errors', () => {
  it('builds messages in the factories', () => {
    expect(Err.missingInput('login_0').message).toBe('Input "login_0" is missing from the submission');
    expect(Err.formHasErrors('login', 'Must not be empty').message).toBe(
      'Form "login" was submitted with errors: Must not be empty'
    );
  });

  it('formats errors for humans', () => {
    expect(formatAppError(Err.formNotSubmitted('login'))).toBe('Form "login" was not submitted');
    expect(formatAppError(Err.resultSchemaMismatch('signup', ['age: Expected number, received nan']))).toBe(
      'Result of form "signup" does not match the expected shape\n\n  - age: Expected number, received nan'
    );
    expect(formatAppError(Err.configInvalid([]))).toBe('Invalid configuration\n\n  - (no details)');
  });

  it('flattens errors for logs', () => {
    expect(formatErrorForLogs(Err.invalidFormId('x-y'))).toEqual({
      errorTag: 'InvalidFormId',
      message: Err.invalidFormId('x-y').message,
      id: 'x-y',
    });
  });

  it('tells data errors from thrown contract violations', () => {
    const violation = new NotAValueError('function awaiting 1 argument(s)');

    expect(isAppError(Err.missingInput('a'))).toBe(true);
    expect(isAppError(violation)).toBe(false);
    expect(isContractViolation(violation)).toBe(true);
    expect(isContractViolation(new Error('plain'))).toBe(false);
    expect(violation.message).toBe("Can't get value from function awaiting 1 argument(s)");
    expect(violation._tag).toBe('NotAValue');
  });

  it('groups errors by category', () => {
    expect(isSubmissionError(Err.resultNotValue('f'))).toBe(true);
    expect(isDataError(Err.resultSchemaMismatch('f', []))).toBe(true);
    expect(isConfigurationError(Err.invalidFormId('?'))).toBe(true);
    expect(isSubmissionError(Err.configInvalid([]))).toBe(false);
  });
});
