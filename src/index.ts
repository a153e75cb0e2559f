/**
 * brace-format - Python-style str.format templates for TypeScript
 *
 * @packageDocumentation
 */

// Entry points
export {
  format,
  formatMap,
  formatRecord,
  mustFormat,
  mustFormatMap,
  mustFormatRecord,
  Formatter,
  createFormatter,
  tokenize,
  splitField,
  PositionalResolver,
  KeyedResolver,
  RecordResolver,
} from "./templates/index.js";
export type {
  ArgumentResolver,
  TemplateToken,
  LiteralToken,
  FieldToken,
} from "./templates/index.js";

// Format specification engine
export {
  OutputBuffer,
  parseSpec,
  createDirective,
  renderValue,
  renderToString,
  transformPercent,
  convertValue,
  AlignSchema,
  SignSchema,
  VerbSchema,
  DirectiveSchema,
  FormatterOptionsSchema,
} from "./format/index.js";
export type {
  Align,
  Sign,
  Verb,
  Directive,
  DirectiveInput,
  FormatterOptions,
  FormatterOptionsInput,
  ConvertOptions,
} from "./format/index.js";

// Library utilities
export {
  // Errors
  FormatError,
  TemplateSyntaxError,
  ResolutionError,
  ConversionError,
  ValidationError,
  // Result utilities
  ok,
  err,
  unwrap,
  map,
  andThen,
  // Logger
  logger,
} from "./lib/index.js";
export type { Result, LogLevel } from "./lib/index.js";
