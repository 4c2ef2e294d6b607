import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';
import type { FormError, InvalidFormIdError, MissingInputError } from '../core/errors/index.js';
import { Err, formatErrorForLogs, validateFormResult } from '../core/errors/index.js';
import type { Logger } from '../core/logging/index.js';
import { createBootstrapLogger } from '../core/logging/index.js';
import type { Value } from '../core/values/index.js';
import { errorReason, fn, get, isApplicable, isError } from '../core/values/index.js';
import type { FormMethod } from '../config/app-config.js';
import type { Attributes, Fragment } from '../html/fragment.js';
import { renderFragment, tag } from '../html/fragment.js';
import { build, buildWith } from '../rendering/builder.js';
import type { InputMapping } from '../rendering/render-dict.js';
import { RenderDict } from '../rendering/render-dict.js';
import type { Formlet, FormletInstance } from '../formlets/formlet.js';
import { mapHtml } from '../formlets/fields.js';
import { NameSource } from '../formlets/name-source.js';

export interface CreateFormOptions {
  /** Unique throughout the application; prefixes every field name. */
  readonly id: string;
  readonly action: string;
  readonly formlet: Formlet;
  readonly attributes?: Attributes;
  readonly method?: FormMethod;
  readonly logger?: Logger;
}

const FormIdSchema = z.string().regex(/^[a-zA-Z][a-zA-Z0-9_]+$/);

type SubmissionState =
  | { readonly kind: 'pristine' }
  | { readonly kind: 'received'; readonly input: InputMapping }
  | { readonly kind: 'collected'; readonly input: InputMapping; readonly result: Value }
  | { readonly kind: 'incomplete'; readonly input: InputMapping; readonly missing: MissingInputError };

/**
 * A formlet bound to an id, wrapped in a `<form>` tag, plus the state of its
 * latest submission.
 */
export class Form {
  private state: SubmissionState = { kind: 'pristine' };

  constructor(
    readonly id: string,
    private readonly instance: FormletInstance,
    private readonly logger: Logger
  ) {}

  /** Hand over submitted input. Drops whatever was collected before. */
  init(input: InputMapping): this {
    this.state = { kind: 'received', input };
    this.logger.debug({ formId: this.id, fieldCount: Object.keys(input).length }, 'Form initialised');
    return this;
  }

  /** True once input was given and every field of the form is present in it. */
  wasSubmitted(): boolean {
    return this.collect().kind === 'collected';
  }

  wasSuccessful(): boolean {
    const state = this.collect();
    return state.kind === 'collected' && !isError(state.result);
  }

  html(): string {
    const state = this.collect();
    const fragment =
      state.kind === 'collected'
        ? buildWith(this.instance.builder, RenderDict.fromSubmission(state.input, state.result))
        : build(this.instance.builder);
    return renderFragment(fragment);
  }

  result(): Result<unknown, FormError> {
    const state = this.collect();
    if (state.kind !== 'collected') {
      return err(Err.formNotSubmitted(this.id));
    }
    if (isError(state.result)) {
      return err(Err.formHasErrors(this.id, errorReason(state.result)));
    }
    if (isApplicable(state.result)) {
      return err(Err.resultNotValue(this.id));
    }
    return ok(get(state.result));
  }

  /** `result()` parsed into a typed value. */
  resultAs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): Result<T, FormError> {
    return this.result().andThen((value) => validateFormResult(schema, value, this.id));
  }

  error(): Result<string, FormError> {
    const state = this.collect();
    if (state.kind !== 'collected') {
      return err(Err.formNotSubmitted(this.id));
    }
    if (!isError(state.result)) {
      return err(Err.formSubmittedSuccessfully(this.id));
    }
    return ok(errorReason(state.result));
  }

  private collect(): SubmissionState {
    const current = this.state;
    if (current.kind !== 'received') {
      return current;
    }

    this.state = this.instance.collector.collect(current.input).match<SubmissionState>(
      (result) => ({ kind: 'collected', input: current.input, result }),
      (missing) => {
        this.logger.debug({ formId: this.id, ...formatErrorForLogs(missing) }, 'Submission incomplete');
        return { kind: 'incomplete', input: current.input, missing };
      }
    );
    return this.state;
  }
}

export function createForm(options: CreateFormOptions): Result<Form, InvalidFormIdError> {
  if (!FormIdSchema.safeParse(options.id).success) {
    return err(Err.invalidFormId(options.id));
  }

  const formAttributes: Attributes = {
    ...options.attributes,
    method: options.method ?? 'post',
    action: options.action,
  };
  const wrapped = mapHtml(
    options.formlet,
    fn((_dict: RenderDict, content: Fragment) => tag('form', formAttributes, content))
  );

  const instance = wrapped.instantiate(NameSource.forForm(options.id));
  return ok(new Form(options.id, instance, options.logger ?? createBootstrapLogger('Form')));
}
