/**
 * Template Module
 *
 * Expands Python-style brace templates:
 * - Tokenize literal text and {name:spec} fields
 * - Resolve field values from positional, keyed or record arguments
 * - Render each value through its format specification
 *
 * @example
 * ```typescript
 * import { createFormatter } from "@/templates";
 *
 * const formatter = createFormatter({ strictNumbering: true });
 *
 * const result = formatter.formatMap("{name:<8}|{score:6.1%}", {
 *   name: "ada",
 *   score: 0.9731,
 * });
 *
 * if (result.success) {
 *   console.log(result.data); // "ada     | 97.3%"
 * }
 * ```
 */

export { Formatter, createFormatter } from "./formatter.js";
export {
  format,
  formatMap,
  formatRecord,
  mustFormat,
  mustFormatMap,
  mustFormatRecord,
} from "./api.js";
export { tokenize, splitField } from "./tokenizer.js";
export type { TemplateToken, LiteralToken, FieldToken } from "./tokenizer.js";
export { PositionalResolver, KeyedResolver, RecordResolver } from "./resolvers.js";
export type { ArgumentResolver } from "./resolvers.js";
