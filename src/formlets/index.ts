export { NameSource } from './name-source.js';
export type { Collector, Formlet, FormletInstance } from './formlet.js';
export { ap, apAll, formlet, keepLeft, keepRight, lift, mapValue, pure, text } from './formlet.js';
export {
  ValidationFailure,
  fieldErrors,
  mapHtml,
  satisfies,
  submitButton,
  textArea,
  textInput,
} from './fields.js';
