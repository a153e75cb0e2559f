export {
  AlignSchema,
  SignSchema,
  VerbSchema,
  DirectiveSchema,
  MAX_WIDTH,
  FLOAT_VERBS,
  INTEGER_VERBS,
} from "./directive.schema.js";
export type {
  Align,
  Sign,
  Verb,
  Directive,
  DirectiveInput,
} from "./directive.schema.js";

export { FormatterOptionsSchema } from "./options.schema.js";
export type { FormatterOptions, FormatterOptionsInput } from "./options.schema.js";
