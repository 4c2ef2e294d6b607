import { assertNever } from '../../runtime/assert-never.js';
import {
  GetOnErrorError,
  NotAnErrorError,
  NotApplicableError,
  NotAValueError,
} from '../errors/contract-violations.js';
import type {
  FunctionFields,
  FunctionValue,
  Origin,
  ReifiableErrorClass,
  Value,
} from './value.js';
import { errorValue, functionValue, toValue } from './value.js';

/** Reason of the error a call yields when any of its arguments is an error. */
export const ARGUMENTS_CONTAIN_ERRORS = 'Function arguments contain errors.';

export function isSatisfied(f: FunctionValue): boolean {
  return f.arity === 0;
}

/**
 * Result of a satisfied call. Evaluated once per instance; later calls return
 * the memoised value.
 */
export function result(f: FunctionValue): Value {
  if (!isSatisfied(f)) {
    throw new NotAValueError(`unsatisfied function (arity ${f.arity})`);
  }
  return f.cache.getOrInit(() => evaluate(f));
}

/** Result of a satisfied call; any other value is returned as is. */
export function force(value: Value): Value {
  return value.kind === 'function' && isSatisfied(value) ? result(value) : value;
}

export function get(value: Value): unknown {
  switch (value.kind) {
    case 'plain':
      return value.payload;
    case 'function':
      if (isSatisfied(value)) return get(result(value));
      throw new NotAValueError(`function awaiting ${value.arity} argument(s)`);
    case 'error':
      throw new GetOnErrorError(value.reason);
    default:
      return assertNever(value);
  }
}

/**
 * Apply a value to an argument. Never mutates `value`: a partially applied
 * function can be reused in several places.
 */
export function apply(value: Value, argument: Value): Value {
  switch (value.kind) {
    case 'plain':
      throw new NotApplicableError('plain value');
    case 'function':
      if (isSatisfied(value)) return apply(result(value), argument);
      return derive(value, {
        arity: value.arity - 1,
        args: [...value.args, argument],
      });
    case 'error':
      return value;
    default:
      return assertNever(value);
  }
}

export function applyAll(value: Value, ...args: readonly Value[]): Value {
  return args.reduce(apply, value);
}

/** Errors count as applicable so that `get` is never reached on them. */
export function isApplicable(value: Value): boolean {
  switch (value.kind) {
    case 'plain':
      return false;
    case 'function':
      return isSatisfied(value) ? isApplicable(result(value)) : true;
    case 'error':
      return true;
    default:
      return assertNever(value);
  }
}

export function isError(value: Value): boolean {
  switch (value.kind) {
    case 'plain':
      return false;
    case 'function':
      return isSatisfied(value) ? isError(result(value)) : false;
    case 'error':
      return true;
    default:
      return assertNever(value);
  }
}

export function errorReason(value: Value): string {
  switch (value.kind) {
    case 'plain':
      throw new NotAnErrorError('plain value');
    case 'function':
      if (isSatisfied(value)) return errorReason(result(value));
      throw new NotAnErrorError(`function awaiting ${value.arity} argument(s)`);
    case 'error':
      return value.reason;
    default:
      return assertNever(value);
  }
}

/**
 * Copy of `f` that turns thrown instances of `errorClass` into error values
 * when the call is evaluated.
 */
export function catchAndReify(f: FunctionValue, errorClass: ReifiableErrorClass): FunctionValue {
  return derive(f, { reify: new Set([...f.reify, errorClass]) });
}

export function withOrigin(f: FunctionValue, origin: Origin): FunctionValue {
  return derive(f, { origin });
}

// =============================================================================
// Internal
// =============================================================================

function derive(f: FunctionValue, changes: Partial<FunctionFields>): FunctionValue {
  return functionValue({
    arity: f.arity,
    operation: f.operation,
    args: f.args,
    reify: f.reify,
    origin: f.origin,
    ...changes,
  });
}

function evaluate(f: FunctionValue): Value {
  const { payloads, hasError } = evaluateArgs(f.args);
  if (hasError) {
    return errorValue(ARGUMENTS_CONTAIN_ERRORS, f);
  }

  let raw: unknown;
  try {
    raw = f.operation(...payloads);
  } catch (e) {
    if (e instanceof Error && isReified(f, e)) {
      return errorValue(e.message, f);
    }
    throw e;
  }

  return toValue(raw, f.origin);
}

/**
 * Unwrap arguments left to right. Every argument is visited even after an
 * error; arguments still awaiting input are handed over as values.
 */
function evaluateArgs(args: readonly Value[]): { readonly payloads: unknown[]; readonly hasError: boolean } {
  let hasError = false;
  const payloads = args.map((arg) => {
    if (isError(arg)) {
      hasError = true;
      return arg;
    }
    return isApplicable(arg) ? arg : get(arg);
  });
  return { payloads, hasError };
}

function isReified(f: FunctionValue, e: Error): boolean {
  for (const errorClass of f.reify) {
    if (e instanceof errorClass) return true;
  }
  return false;
}
