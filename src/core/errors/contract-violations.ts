/**
 * Contract Violations - thrown, never carried as data.
 *
 * Each one means a formlet or builder was put together wrongly: asking a
 * function for its payload, applying a plain value, a producer that does not
 * settle after receiving the render dictionary. Fail fast; do not recover.
 */

export type ContractViolationTag =
  | 'NotApplicable'
  | 'NotAValue'
  | 'GetOnError'
  | 'NotAnError'
  | 'InvalidArity'
  | 'BuilderContract'
  | 'InvalidFragment';

export abstract class ContractViolation extends Error {
  abstract readonly _tag: ContractViolationTag;
}

export class NotApplicableError extends ContractViolation {
  readonly _tag = 'NotApplicable' as const;

  constructor(readonly what: string) {
    super(`Can't apply ${what} to any value`);
    this.name = 'NotApplicableError';
  }
}

export class NotAValueError extends ContractViolation {
  readonly _tag = 'NotAValue' as const;

  constructor(readonly what: string) {
    super(`Can't get value from ${what}`);
    this.name = 'NotAValueError';
  }
}

export class GetOnErrorError extends ContractViolation {
  readonly _tag = 'GetOnError' as const;

  constructor(readonly reason: string) {
    super(`Can't get value from error value: ${reason}`);
    this.name = 'GetOnErrorError';
  }
}

export class NotAnErrorError extends ContractViolation {
  readonly _tag = 'NotAnError' as const;

  constructor(readonly what: string) {
    super(`${what} carries no error reason`);
    this.name = 'NotAnErrorError';
  }
}

export class InvalidArityError extends ContractViolation {
  readonly _tag = 'InvalidArity' as const;

  constructor(readonly arity: number) {
    super(`Arity must be a non-negative integer, got ${arity}`);
    this.name = 'InvalidArityError';
  }
}

export class BuilderContractViolation extends ContractViolation {
  readonly _tag = 'BuilderContract' as const;

  constructor(
    readonly tagName: string,
    readonly part: 'attributes' | 'content',
    readonly details: string
  ) {
    super(`Builder for <${tagName}>: ${part} producer ${details}`);
    this.name = 'BuilderContractViolation';
  }
}

export class InvalidFragmentError extends ContractViolation {
  readonly _tag = 'InvalidFragment' as const;

  constructor(readonly fieldName: string | null, readonly received: string) {
    super(
      fieldName === null
        ? `Delegate returned ${received}, expected a fragment`
        : `Delegate for "${fieldName}" returned ${received}, expected a fragment`
    );
    this.name = 'InvalidFragmentError';
  }
}
