import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { fn } from '../../../src/core/values/index.js';
import { createForm } from '../../../src/form/form.js';
import type { CreateFormOptions, Form } from '../../../src/form/form.js';
import type { Formlet } from '../../../src/formlets/index.js';
import { apAll, keepLeft, lift, pure, satisfies, textInput } from '../../../src/formlets/index.js';
import { createCapturingLogger, silentLogger } from '../../helpers/capture-logger.js';

const nonEmpty = (f: Formlet): Formlet =>
  satisfies(f, (x) => typeof x === 'string' && x.length > 0, 'Must not be empty');

function formOf(formlet: Formlet, overrides: Partial<CreateFormOptions> = {}): Form {
  return createForm({ id: 'login', action: '/login', formlet, logger: silentLogger(), ...overrides })._unsafeUnwrap();
}

describe('createForm', () => {
  it('rejects ids that are not identifiers', () => {
    const result = createForm({ id: 'bad-id', action: '/', formlet: textInput(), logger: silentLogger() });

    expect(result._unsafeUnwrapErr()).toMatchObject({ _tag: 'InvalidFormId', id: 'bad-id' });
    expect(createForm({ id: '1st', action: '/', formlet: textInput() }).isErr()).toBe(true);
  });

  it('wraps the formlet in a form tag with the given attributes', () => {
    const form = formOf(textInput(), { id: 'search', action: '/s', method: 'get', attributes: { class: 'stacked' } });

    expect(form.html()).toBe('<form class="stacked" method="get" action="/s"><input type="text" name="search_0"/></form>');
  });
});

describe('Form', () => {
  it('renders pristine and reports nothing before init', () => {
    const form = formOf(textInput());

    expect(form.wasSubmitted()).toBe(false);
    expect(form.wasSuccessful()).toBe(false);
    expect(form.html()).toBe('<form method="post" action="/login"><input type="text" name="login_0"/></form>');
    expect(form.result()._unsafeUnwrapErr()._tag).toBe('FormNotSubmitted');
    expect(form.error()._unsafeUnwrapErr()._tag).toBe('FormNotSubmitted');
  });

  it('treats input without the form fields as no submission', () => {
    const form = formOf(textInput()).init({ unrelated: 'x' });

    expect(form.wasSubmitted()).toBe(false);
    expect(form.html()).toBe('<form method="post" action="/login"><input type="text" name="login_0"/></form>');
  });

  it('yields the result of a successful submission', () => {
    const form = formOf(nonEmpty(textInput())).init({ login_0: 'ada' });

    expect(form.wasSubmitted()).toBe(true);
    expect(form.wasSuccessful()).toBe(true);
    expect(form.result()._unsafeUnwrap()).toBe('ada');
    expect(form.error()._unsafeUnwrapErr()._tag).toBe('FormSubmittedSuccessfully');
    expect(form.html()).toBe('<form method="post" action="/login"><input type="text" name="login_0" value="ada"/></form>');
  });

  it('renders field errors of a failed submission', () => {
    const form = formOf(nonEmpty(textInput())).init({ login_0: '' });

    expect(form.wasSubmitted()).toBe(true);
    expect(form.wasSuccessful()).toBe(false);
    expect(form.result()._unsafeUnwrapErr()).toMatchObject({ _tag: 'FormHasErrors', reason: 'Must not be empty' });
    expect(form.error()._unsafeUnwrap()).toBe('Must not be empty');
    expect(form.html()).toBe(
      '<form method="post" action="/login"><input type="text" name="login_0" value=""/>' +
        '<ul class="errors"><li>Must not be empty</li></ul></form>'
    );
  });

  it('is not successful when a discarded field fails its check', () => {
    const form = formOf(keepLeft(textInput(), nonEmpty(textInput()))).init({ login_0: 'a', login_1: '' });

    expect(form.wasSubmitted()).toBe(true);
    expect(form.wasSuccessful()).toBe(false);
    expect(form.result()._unsafeUnwrapErr()).toMatchObject({
      _tag: 'FormHasErrors',
      reason: 'Function arguments contain errors.',
    });
    expect(form.html()).toBe(
      '<form method="post" action="/login"><input type="text" name="login_0" value="a"/>' +
        '<input type="text" name="login_1" value=""/><ul class="errors"><li>Must not be empty</li></ul></form>'
    );
  });

  it('forgets the previous submission on init', () => {
    const form = formOf(nonEmpty(textInput())).init({ login_0: '' });
    expect(form.wasSuccessful()).toBe(false);

    form.init({ login_0: 'second try' });

    expect(form.wasSuccessful()).toBe(true);
    expect(form.result()._unsafeUnwrap()).toBe('second try');
  });

  it('refuses a result that is still a function', () => {
    const form = formOf(pure(fn((a: number, b: number) => a + b)), { id: 'calc', action: '/calc' }).init({});

    expect(form.wasSubmitted()).toBe(true);
    expect(form.result()._unsafeUnwrapErr()._tag).toBe('ResultNotValue');
    expect(form.html()).toBe('<form method="post" action="/calc"></form>');
  });

  describe('resultAs', () => {
    const signup = apAll(
      lift((name: string, age: string) => ({ name, age: Number(age) })),
      textInput(),
      textInput()
    );
    const Signup = z.object({ name: z.string(), age: z.number().int() });

    it('parses the result into the schema type', () => {
      const form = formOf(signup, { id: 'signup' }).init({ signup_0: 'Ada', signup_1: '36' });

      expect(form.resultAs(Signup)._unsafeUnwrap()).toEqual({ name: 'Ada', age: 36 });
    });

    it('reports a result that does not fit', () => {
      const form = formOf(signup, { id: 'signup' }).init({ signup_0: 'Ada', signup_1: 'old' });
      const error = form.resultAs(Signup)._unsafeUnwrapErr();

      expect(error._tag).toBe('ResultSchemaMismatch');
      expect(error.message.startsWith('Result of form "signup" does not match the expected shape: age: ')).toBe(true);
    });
  });

  describe('logging', () => {
    it('logs initialisation without raw values', () => {
      const capture = createCapturingLogger();
      formOf(textInput(), { logger: capture.logger }).init({ login_0: 'secret' });

      expect(capture.entries()).toHaveLength(1);
      expect(capture.entries()[0]).toMatchObject({ msg: 'Form initialised', formId: 'login', fieldCount: 1 });
      expect(JSON.stringify(capture.entries()[0])).not.toContain('secret');
    });

    it('logs incomplete submissions', () => {
      const capture = createCapturingLogger();
      const form = formOf(textInput(), { logger: capture.logger }).init({});

      form.wasSubmitted();

      expect(capture.entries()[1]).toMatchObject({
        msg: 'Submission incomplete',
        formId: 'login',
        errorTag: 'MissingInput',
        field: 'login_0',
      });
    });
  });
});
