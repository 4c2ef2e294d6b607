import { z } from 'zod';
import { assertNever } from '../runtime/assert-never.js';

/**
 * HTML fragments.
 *
 * Builders produce fragments; nothing is turned into a string until
 * `renderFragment`. Literals are written raw, text and attribute values are
 * escaped.
 */

export type Attributes = Readonly<Record<string, string>>;

export type Fragment =
  | { readonly kind: 'literal'; readonly html: string }
  | { readonly kind: 'text'; readonly text: string }
  | {
      readonly kind: 'tag';
      readonly name: string;
      readonly attributes: Attributes;
      /** `null` renders a self-closing tag. */
      readonly content: Fragment | null;
    }
  | { readonly kind: 'concat'; readonly left: Fragment; readonly right: Fragment }
  | { readonly kind: 'nothing' };

export const literal = (html: string): Fragment => ({ kind: 'literal', html });

export const text = (value: string): Fragment => ({ kind: 'text', text: value });

export const tag = (
  name: string,
  attributes: Attributes = {},
  content: Fragment | null = null
): Fragment => ({ kind: 'tag', name, attributes, content });

export const concat = (left: Fragment, right: Fragment): Fragment => ({ kind: 'concat', left, right });

export const nothing = (): Fragment => ({ kind: 'nothing' });

export function concatAll(fragments: readonly Fragment[]): Fragment {
  return fragments.reduce(concat, nothing());
}

// =============================================================================
// Structural check (fragments may come back from delegates we do not own)
// =============================================================================

export const AttributesSchema = z.record(z.string());

const FragmentSchema: z.ZodType<Fragment> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('literal'), html: z.string() }),
    z.object({ kind: z.literal('text'), text: z.string() }),
    z.object({
      kind: z.literal('tag'),
      name: z.string().min(1),
      attributes: AttributesSchema,
      content: FragmentSchema.nullable(),
    }),
    z.object({ kind: z.literal('concat'), left: FragmentSchema, right: FragmentSchema }),
    z.object({ kind: z.literal('nothing') }),
  ])
);

export function isFragment(x: unknown): x is Fragment {
  return FragmentSchema.safeParse(x).success;
}

// =============================================================================
// Rendering
// =============================================================================

const ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

function renderAttributes(attributes: Attributes): string {
  return Object.entries(attributes)
    .map(([key, value]) => ` ${key}="${escapeHtml(value)}"`)
    .join('');
}

export function renderFragment(fragment: Fragment): string {
  switch (fragment.kind) {
    case 'literal':
      return fragment.html;
    case 'text':
      return escapeHtml(fragment.text);
    case 'tag': {
      const open = `${fragment.name}${renderAttributes(fragment.attributes)}`;
      return fragment.content === null
        ? `<${open}/>`
        : `<${open}>${renderFragment(fragment.content)}</${fragment.name}>`;
    }
    case 'concat':
      return renderFragment(fragment.left) + renderFragment(fragment.right);
    case 'nothing':
      return '';
    default:
      return assertNever(fragment);
  }
}
