import { describe, expect, it } from 'vitest';
import {
  concat,
  concatAll,
  escapeHtml,
  isFragment,
  literal,
  nothing,
  renderFragment,
  tag,
  text,
} from '../../../src/html/fragment.js';

describe('fragments', () => {
  describe('renderFragment', () => {
    it('writes literals raw', () => {
      expect(renderFragment(literal('<b>bold</b>'))).toBe('<b>bold</b>');
    });

    it('escapes text', () => {
      expect(renderFragment(tag('p', {}, text('a < b & "c"')))).toBe('<p>a &lt; b &amp; &quot;c&quot;</p>');
    });

    it('escapes attribute values and keeps their order', () => {
      expect(renderFragment(tag('a', { href: '/x?a=1&b=2', title: `it's` }, nothing()))).toBe(
        '<a href="/x?a=1&amp;b=2" title="it&#39;s"></a>'
      );
    });

    it('self-closes tags without content', () => {
      expect(renderFragment(tag('input', { type: 'text', name: 'q' }))).toBe('<input type="text" name="q"/>');
    });

    it('concatenates in order', () => {
      expect(renderFragment(concat(literal('<a>'), literal('<b>')))).toBe('<a><b>');
      expect(renderFragment(concatAll([text('x'), text('y'), text('z')]))).toBe('xyz');
      expect(renderFragment(concatAll([]))).toBe('');
    });
  });

  it('escapes the five special characters', () => {
    expect(escapeHtml(`&<>"'`)).toBe('&amp;&lt;&gt;&quot;&#39;');
  });

  describe('isFragment', () => {
    it('accepts nested fragments', () => {
      expect(isFragment(tag('div', { class: 'row' }, concat(text('a'), tag('br'))))).toBe(true);
      expect(isFragment(nothing())).toBe(true);
    });

    it('rejects anything else', () => {
      expect(isFragment('<p>')).toBe(false);
      expect(isFragment(null)).toBe(false);
      expect(isFragment({ kind: 'tag', name: 'p' })).toBe(false);
      expect(isFragment({ kind: 'bogus' })).toBe(false);
    });
  });
});
