import { assertNever } from '../runtime/assert-never.js';
import type { FunctionValue, Value } from '../core/values/index.js';
import { apply, errorReason, get, isApplicable, isError, plain } from '../core/values/index.js';
import { BuilderContractViolation, InvalidFragmentError } from '../core/errors/index.js';
import type { Attributes, Fragment } from '../html/fragment.js';
import { AttributesSchema, concat, isFragment, literal, tag } from '../html/fragment.js';
import { RenderDict } from './render-dict.js';

/**
 * Rendering side of a formlet. Built once when the form is defined, then
 * rendered any number of times against different dictionaries.
 */
export type Builder =
  | ConstBuilder
  | CombinedBuilder
  | TagBuilder
  | DelegateBuilder;

export interface ConstBuilder {
  readonly kind: 'const';
  readonly content: Fragment;
}

export interface CombinedBuilder {
  readonly kind: 'combined';
  readonly left: Builder;
  readonly right: Builder;
}

export interface TagBuilder {
  readonly kind: 'tag';
  readonly tagName: string;
  /** Takes the render dictionary, yields an attribute record. */
  readonly attributes: FunctionValue;
  /** Takes the render dictionary, yields a fragment or `null`. */
  readonly content: FunctionValue;
}

/** Anything that renders itself, e.g. a composed sub-form. */
export interface FragmentProvider {
  getFragment(dict: RenderDict, fieldName: string | null): unknown;
}

export interface DelegateBuilder {
  readonly kind: 'delegate';
  readonly target: FragmentProvider;
  readonly fieldName: string | null;
}

export const constant = (content: string | Fragment): Builder => ({
  kind: 'const',
  content: typeof content === 'string' ? literal(content) : content,
});

export const combined = (left: Builder, right: Builder): Builder => ({ kind: 'combined', left, right });

export function combineAll(first: Builder, ...rest: readonly Builder[]): Builder {
  return rest.reduce(combined, first);
}

export const tagged = (tagName: string, attributes: FunctionValue, content: FunctionValue): Builder => ({
  kind: 'tag',
  tagName,
  attributes,
  content,
});

export const delegate = (target: FragmentProvider, fieldName: string | null): Builder => ({
  kind: 'delegate',
  target,
  fieldName,
});

export function buildWith(builder: Builder, dict: RenderDict): Fragment {
  switch (builder.kind) {
    case 'const':
      return builder.content;
    case 'combined':
      return concat(buildWith(builder.left, dict), buildWith(builder.right, dict));
    case 'tag':
      return buildTag(builder, dict);
    case 'delegate': {
      const fragment = builder.target.getFragment(dict, builder.fieldName);
      if (!isFragment(fragment)) {
        throw new InvalidFragmentError(builder.fieldName, describe(fragment));
      }
      return fragment;
    }
    default:
      return assertNever(builder);
  }
}

/** Render without a submission. */
export function build(builder: Builder): Fragment {
  return buildWith(builder, RenderDict.empty());
}

// =============================================================================
// Internal
// =============================================================================

function buildTag(builder: TagBuilder, dict: RenderDict): Fragment {
  const d = plain(dict);

  const rawAttributes = settle(builder, 'attributes', d);
  const attributes = AttributesSchema.safeParse(rawAttributes);
  if (!attributes.success) {
    throw new BuilderContractViolation(builder.tagName, 'attributes', `yielded ${describe(rawAttributes)}, expected a string record`);
  }

  const attrs: Attributes = attributes.data;
  const content = settle(builder, 'content', d);
  if (content === null) {
    return tag(builder.tagName, attrs, null);
  }
  if (!isFragment(content)) {
    throw new BuilderContractViolation(builder.tagName, 'content', `yielded ${describe(content)}, expected a fragment or null`);
  }
  return tag(builder.tagName, attrs, content);
}

/** Feed the dictionary to a producer and insist it yields a payload. */
function settle(builder: TagBuilder, part: 'attributes' | 'content', dict: Value): unknown {
  const producer = builder[part];
  if (!isApplicable(producer)) {
    throw new BuilderContractViolation(builder.tagName, part, 'does not take the render dictionary');
  }

  const produced = apply(producer, dict);
  if (isError(produced)) {
    throw new BuilderContractViolation(builder.tagName, part, `failed: ${errorReason(produced)}`);
  }
  if (isApplicable(produced)) {
    throw new BuilderContractViolation(builder.tagName, part, 'still expects arguments after the render dictionary');
  }
  return get(produced);
}

function describe(x: unknown): string {
  if (x === null) return 'null';
  if (Array.isArray(x)) return 'an array';
  return typeof x === 'object' ? 'an object' : `a ${typeof x}`;
}
