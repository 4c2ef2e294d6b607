import { OnceCell } from '../../runtime/once-cell.js';
import { InvalidArityError } from '../errors/contract-violations.js';

/**
 * Identifier of the form field a value belongs to. Errors are routed back
 * to fields by origin when a render dictionary is computed.
 */
export type Origin = string | null;

/**
 * Any callable bound into a function value. It receives unwrapped payloads
 * positionally, so its parameter types are the caller's business.
 */
export type Operation = (...args: any[]) => unknown;

/** Exception class whose instances a function value turns into error values. */
export type ReifiableErrorClass = abstract new (...args: any[]) => Error;

export interface PlainValue {
  readonly kind: 'plain';
  readonly payload: unknown;
  readonly origin: Origin;
}

export interface FunctionValue {
  readonly kind: 'function';
  /** Arguments still required before the call is satisfied. */
  readonly arity: number;
  readonly operation: Operation;
  readonly args: readonly Value[];
  readonly reify: ReadonlySet<ReifiableErrorClass>;
  readonly origin: Origin;
  /** Filled at most once, when the satisfied call is first evaluated. */
  readonly cache: OnceCell<Value>;
}

export interface ErrorValue {
  readonly kind: 'error';
  readonly reason: string;
  /** The value this error replaces. Kept for provenance only. */
  readonly original: Value;
  readonly origin: Origin;
}

export type Value = PlainValue | FunctionValue | ErrorValue;

export type FunctionFields = Omit<FunctionValue, 'kind' | 'cache'>;

const registry = new WeakSet<object>();

function mark<V extends Value>(value: V): V {
  registry.add(value);
  return value;
}

export function isValue(x: unknown): x is Value {
  return typeof x === 'object' && x !== null && registry.has(x);
}

export function plain(payload: unknown, origin: Origin = null): PlainValue {
  return mark({ kind: 'plain', payload, origin });
}

/**
 * Wrap an operation as a curried function value.
 *
 * `arity` defaults to the operation's declared parameter count. Bound
 * arguments that are not values yet are wrapped as plain values carrying
 * `origin`.
 */
export function fn(
  operation: Operation,
  arity: number = operation.length,
  boundArgs: readonly unknown[] = [],
  origin: Origin = null
): FunctionValue {
  return functionValue({
    arity,
    operation,
    args: boundArgs.map((arg) => toValue(arg, origin)),
    reify: new Set(),
    origin,
  });
}

export function functionValue(fields: FunctionFields): FunctionValue {
  if (!Number.isInteger(fields.arity) || fields.arity < 0) {
    throw new InvalidArityError(fields.arity);
  }
  return mark({
    kind: 'function',
    arity: fields.arity,
    operation: fields.operation,
    args: fields.args,
    reify: fields.reify,
    origin: fields.origin,
    cache: new OnceCell<Value>(),
  });
}

export function errorValue(reason: string, original: Value): ErrorValue {
  return mark({ kind: 'error', reason, original, origin: original.origin });
}

/** Pass values through, wrap anything else as a plain value. */
export function toValue(x: unknown, origin: Origin): Value {
  return isValue(x) ? x : plain(x, origin);
}
