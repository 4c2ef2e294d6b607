import { assertNever } from '../runtime/assert-never.js';
import type { Value } from '../core/values/index.js';
import { plain } from '../core/values/index.js';

/** Raw submitted input, keyed by field name. */
export type InputMapping = Readonly<Record<string, unknown>>;

export type ErrorMap = ReadonlyMap<string, readonly string[]>;

/**
 * What a builder needs to re-render a submitted form: the raw input echoed
 * back and the error messages of every field, keyed by origin.
 */
export class RenderDict {
  private static readonly _empty = new RenderDict({}, collectErrors(plain(null)), true);

  private constructor(
    private readonly _values: InputMapping,
    private readonly _errors: ErrorMap,
    readonly isEmpty: boolean
  ) {}

  /** The dictionary of a form nobody submitted yet. */
  static empty(): RenderDict {
    return RenderDict._empty;
  }

  static fromSubmission(input: InputMapping, result: Value): RenderDict {
    return new RenderDict(input, collectErrors(result), false);
  }

  get values(): InputMapping {
    return this._values;
  }

  get errors(): ErrorMap {
    return this._errors;
  }

  valueExists(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this._values, name);
  }

  value(name: string): unknown {
    return this.valueExists(name) ? this._values[name] : undefined;
  }

  errorsFor(name: string): readonly string[] | undefined {
    return this._errors.get(name);
  }
}

/**
 * Walk a value tree and gather error reasons per origin, in visiting order.
 * Function values are inspected through their bound arguments only; nothing
 * is evaluated.
 */
export function collectErrors(value: Value): ErrorMap {
  const errors = new Map<string, string[]>();
  visit(value, errors);
  return errors;
}

function visit(value: Value, errors: Map<string, string[]>): void {
  switch (value.kind) {
    case 'error': {
      if (value.origin !== null) {
        const existing = errors.get(value.origin);
        if (existing) {
          existing.push(value.reason);
        } else {
          errors.set(value.origin, [value.reason]);
        }
      }
      visit(value.original, errors);
      return;
    }
    case 'function':
      for (const arg of value.args) {
        visit(arg, errors);
      }
      return;
    case 'plain':
      return;
    default:
      assertNever(value);
  }
}
