import { describe, expect, it, vi } from 'vitest';
import { apply, applyAll, errorValue, fn, plain } from '../../../src/core/values/index.js';
import { RenderDict, collectErrors } from '../../../src/rendering/render-dict.js';

describe('RenderDict', () => {
  it('has a single empty instance without values or errors', () => {
    const empty = RenderDict.empty();

    expect(empty).toBe(RenderDict.empty());
    expect(empty.isEmpty).toBe(true);
    expect(empty.values).toEqual({});
    expect(empty.errors.size).toBe(0);
  });

  it('echoes the submitted input verbatim', () => {
    const input = { f_0: 'ada', f_1: '' };
    const dict = RenderDict.fromSubmission(input, plain(null));

    expect(dict.isEmpty).toBe(false);
    expect(dict.values).toBe(input);
    expect(dict.valueExists('f_1')).toBe(true);
    expect(dict.value('f_0')).toBe('ada');
    expect(dict.valueExists('f_2')).toBe(false);
    expect(dict.value('f_2')).toBeUndefined();
  });

  it('looks up errors by origin', () => {
    const dict = RenderDict.fromSubmission({}, errorValue('required', plain('', 'f_0')));

    expect(dict.errorsFor('f_0')).toEqual(['required']);
    expect(dict.errorsFor('f_1')).toBeUndefined();
  });
});

describe('collectErrors', () => {
  it('contributes nothing for plain values', () => {
    expect(collectErrors(plain(1, 'f')).size).toBe(0);
  });

  it('skips errors without origin', () => {
    expect(collectErrors(errorValue('lost', plain(1))).size).toBe(0);
  });

  it('keeps several errors of one origin in order', () => {
    const value = applyAll(
      fn((a: number, b: number) => a + b),
      errorValue('first', plain(1, 'x')),
      errorValue('second', plain(2, 'x'))
    );

    expect(collectErrors(value).get('x')).toEqual(['first', 'second']);
  });

  it('surfaces errors nested in the original of an error', () => {
    const inner = errorValue('first', plain(1, 'x'));
    const call = apply(fn((a: number) => a, 1, [], 'y'), inner);
    const outer = errorValue('outer', call);

    expect([...collectErrors(outer)]).toEqual([
      ['y', ['outer']],
      ['x', ['first']],
    ]);
  });

  it('does not evaluate functions', () => {
    const op = vi.fn((a: number) => a);
    const call = apply(fn(op, 1), errorValue('bad', plain(0, 'z')));

    expect([...collectErrors(call)]).toEqual([['z', ['bad']]]);
    expect(op).not.toHaveBeenCalled();
    expect(call.kind === 'function' && call.cache.isReady).toBe(false);
  });
});
