import type { Result } from "../lib/result.js";
import type { FormatError } from "../lib/errors.js";
import { Formatter } from "./formatter.js";

const defaultFormatter = new Formatter();

type Mapping = ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>;

/**
 * Python-style str.format against positional arguments
 *
 * @example
 * ```typescript
 * format("{} and {}", "a", "b"); // { success: true, data: "a and b" }
 * ```
 */
export function format(template: string, ...args: unknown[]): Result<string, FormatError> {
  return defaultFormatter.format(template, ...args);
}

/**
 * str.format against a name-keyed mapping
 */
export function formatMap(template: string, mapping: Mapping): Result<string, FormatError> {
  return defaultFormatter.formatMap(template, mapping);
}

/**
 * str.format against the fields of an object
 */
export function formatRecord(template: string, record: unknown): Result<string, FormatError> {
  return defaultFormatter.formatRecord(template, record);
}

/**
 * Like format, but throws on error. For templates known to be valid.
 */
export function mustFormat(template: string, ...args: unknown[]): string {
  return defaultFormatter.mustFormat(template, ...args);
}

export function mustFormatMap(template: string, mapping: Mapping): string {
  return defaultFormatter.mustFormatMap(template, mapping);
}

export function mustFormatRecord(template: string, record: unknown): string {
  return defaultFormatter.mustFormatRecord(template, record);
}
