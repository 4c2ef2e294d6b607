export type {
  ErrorValue,
  FunctionValue,
  Operation,
  Origin,
  PlainValue,
  ReifiableErrorClass,
  Value,
} from './value.js';
export { errorValue, fn, isValue, plain, toValue } from './value.js';
export {
  ARGUMENTS_CONTAIN_ERRORS,
  apply,
  applyAll,
  catchAndReify,
  errorReason,
  force,
  get,
  isApplicable,
  isError,
  isSatisfied,
  result,
  withOrigin,
} from './operations.js';
