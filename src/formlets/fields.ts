import { err, ok } from 'neverthrow';
import { Err } from '../core/errors/index.js';
import type { FunctionValue, Value } from '../core/values/index.js';
import {
  apply,
  applyAll,
  catchAndReify,
  fn,
  force,
  get,
  isError,
  plain,
  withOrigin,
} from '../core/values/index.js';
import type { Attributes, Fragment } from '../html/fragment.js';
import { concatAll, nothing, tag, text as textFragment } from '../html/fragment.js';
import type { Builder, FragmentProvider } from '../rendering/builder.js';
import { buildWith, combined, delegate, tagged } from '../rendering/builder.js';
import type { RenderDict } from '../rendering/render-dict.js';
import type { Collector, Formlet } from './formlet.js';
import { formlet, mapValue, text } from './formlet.js';

/** Thrown by `satisfies` checks and reified into an error value. */
export class ValidationFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationFailure';
  }
}

/** Renders `<ul class="errors">` for a field, or nothing when it has none. */
export const fieldErrors: FragmentProvider = {
  getFragment(dict: RenderDict, fieldName: string | null): Fragment {
    const errors = fieldName === null ? undefined : dict.errorsFor(fieldName);
    if (errors === undefined || errors.length === 0) {
      return nothing();
    }
    return tag('ul', { class: 'errors' }, concatAll(errors.map((e) => tag('li', {}, textFragment(e)))));
  },
};

function inputCollector(name: string): Collector {
  return {
    collect: (input) =>
      Object.prototype.hasOwnProperty.call(input, name)
        ? ok(plain(input[name], name))
        : err(Err.missingInput(name)),
  };
}

/** A named input: claims a fresh name, renders the widget followed by its errors. */
function field(render: (name: string) => Builder): Formlet {
  return formlet((names) => {
    const { name, next } = names.fresh();
    return {
      builder: combined(render(name), delegate(fieldErrors, name)),
      collector: inputCollector(name),
      names: next,
    };
  });
}

/** Submitted text of a field; anything but a string echoes as empty. */
function echoedValue(dict: RenderDict, name: string): string | undefined {
  if (!dict.valueExists(name)) {
    return undefined;
  }
  const value = dict.value(name);
  return typeof value === 'string' ? value : '';
}

export function textInput(attributes: Attributes = {}): Formlet {
  return field((name) =>
    tagged(
      'input',
      fn((dict: RenderDict) => {
        const value = echoedValue(dict, name);
        return value === undefined
          ? { ...attributes, type: 'text', name }
          : { ...attributes, type: 'text', name, value };
      }),
      fn(() => null, 1)
    )
  );
}

export function textArea(attributes: Attributes = {}): Formlet {
  return field((name) =>
    tagged(
      'textarea',
      fn(() => ({ ...attributes, name }), 1),
      fn((dict: RenderDict) => textFragment(echoedValue(dict, name) ?? ''))
    )
  );
}

export function submitButton(label: string, attributes: Attributes = {}): Formlet {
  return text(tag('input', { ...attributes, type: 'submit', value: label }));
}

/**
 * Check the collected value. A failing check becomes an error value
 * attributed to the checked value's origin; values that already are errors
 * pass through unchanged.
 *
 * The check is evaluated during collection so that its outcome, not a pending
 * call, sits in the value tree that render dictionaries walk.
 */
export function satisfies(
  inner: Formlet,
  predicate: (payload: unknown) => boolean,
  message: string
): Formlet {
  const check = catchAndReify(
    fn((payload: unknown) => {
      if (!predicate(payload)) {
        throw new ValidationFailure(message);
      }
      return payload;
    }),
    ValidationFailure
  );

  return mapValue(inner, (value: Value) =>
    isError(value) ? value : force(apply(withOrigin(check, value.origin), value))
  );
}

/**
 * Post-process the markup of a formlet. `transform` is a two-argument
 * function value taking the render dictionary and the rendered fragment.
 */
export function mapHtml(inner: Formlet, transform: FunctionValue): Formlet {
  return formlet((names) => {
    const instance = inner.instantiate(names);
    const target: FragmentProvider = {
      getFragment: (dict) => get(applyAll(transform, plain(dict), plain(buildWith(instance.builder, dict)))),
    };
    return { ...instance, builder: delegate(target, null) };
  });
}
