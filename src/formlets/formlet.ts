import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';
import type { MissingInputError } from '../core/errors/index.js';
import type { Operation, Value } from '../core/values/index.js';
import { apply, applyAll, fn, plain } from '../core/values/index.js';
import type { Fragment } from '../html/fragment.js';
import { nothing } from '../html/fragment.js';
import type { Builder } from '../rendering/builder.js';
import { combined, constant } from '../rendering/builder.js';
import type { InputMapping } from '../rendering/render-dict.js';
import type { NameSource } from './name-source.js';

/**
 * Reads a formlet's value out of submitted input. Missing input means the
 * form was not submitted; failed validation is carried inside the value.
 */
export interface Collector {
  collect(input: InputMapping): Result<Value, MissingInputError>;
}

export interface FormletInstance {
  readonly builder: Builder;
  readonly collector: Collector;
  /** Where the next formlet continues naming fields. */
  readonly names: NameSource;
}

/**
 * A piece of form: how to render it and how to read its value. Builder and
 * collector come out of the same `instantiate` call, so they agree on field
 * names.
 */
export interface Formlet {
  instantiate(names: NameSource): FormletInstance;
}

export const formlet = (instantiate: (names: NameSource) => FormletInstance): Formlet => ({ instantiate });

/** Renders nothing, always yields `value`. */
export function pure(value: Value): Formlet {
  return formlet((names) => ({
    builder: constant(nothing()),
    collector: { collect: () => ok(value) },
    names,
  }));
}

export const lift = (operation: Operation, arity?: number): Formlet => pure(fn(operation, arity));

/** Static markup. Strings are written as raw HTML. Yields `null`. */
export function text(html: string | Fragment): Formlet {
  return formlet((names) => ({
    builder: constant(html),
    collector: { collect: () => ok(plain(null)) },
    names,
  }));
}

function sequence(left: Formlet, right: Formlet, merge: (l: Value, r: Value) => Value): Formlet {
  return formlet((names) => {
    const l = left.instantiate(names);
    const r = right.instantiate(l.names);
    return {
      builder: combined(l.builder, r.builder),
      collector: {
        collect: (input) =>
          l.collector.collect(input).andThen((lv) => r.collector.collect(input).map((rv) => merge(lv, rv))),
      },
      names: r.names,
    };
  });
}

/** Applicative apply: feed the value of `x` to the function value of `f`. */
export const ap = (f: Formlet, x: Formlet): Formlet => sequence(f, x, apply);

export function apAll(f: Formlet, ...args: readonly Formlet[]): Formlet {
  return args.reduce(ap, f);
}

const first = fn((l: unknown, _r: unknown) => l);
const second = fn((_l: unknown, r: unknown) => r);

/**
 * Render both, keep the left value. Both values go through a call, so an
 * error on the discarded side still fails the whole and is collected.
 */
export const keepLeft = (left: Formlet, right: Formlet): Formlet =>
  sequence(left, right, (l, r) => applyAll(first, l, r));

/** Render both, keep the right value. */
export const keepRight = (left: Formlet, right: Formlet): Formlet =>
  sequence(left, right, (l, r) => applyAll(second, l, r));

export function mapValue(inner: Formlet, transform: (value: Value) => Value): Formlet {
  return formlet((names) => {
    const instance = inner.instantiate(names);
    return {
      ...instance,
      collector: { collect: (input) => instance.collector.collect(input).map(transform) },
    };
  });
}
