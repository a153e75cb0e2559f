import { Result, ok, err, map, unwrap } from "../lib/result.js";
import { FormatError, TemplateSyntaxError, ValidationError } from "../lib/errors.js";
import { Logger, logger } from "../lib/logger.js";
import { OutputBuffer } from "../format/buffer.js";
import { parseSpec } from "../format/spec-parser.js";
import { renderValue } from "../format/renderer.js";
import { FormatterOptionsSchema } from "../format/schema/index.js";
import type { FormatterOptions, FormatterOptionsInput } from "../format/schema/index.js";
import { tokenize } from "./tokenizer.js";
import type { FieldToken } from "./tokenizer.js";
import {
  ArgumentResolver,
  KeyedResolver,
  PositionalResolver,
  RecordResolver,
} from "./resolvers.js";

const INDEX_PATTERN = /^\d+$/;

type Numbering = "automatic" | "manual";

/**
 * Expands brace templates against an argument source
 *
 * @example
 * ```typescript
 * const formatter = new Formatter({ strictNumbering: true });
 *
 * const result = formatter.format("{:>8.2f}|{:^7}|", 3.14159, "ab");
 *
 * if (result.success) {
 *   console.log(result.data); // "    3.14|  ab   |"
 * }
 * ```
 */
export class Formatter {
  private readonly options: FormatterOptions;
  private readonly log: Logger;

  /**
   * @throws ValidationError when the options do not match FormatterOptionsSchema
   */
  constructor(options: FormatterOptionsInput = {}) {
    const parsed = FormatterOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ValidationError("Invalid formatter options", {
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    this.options = parsed.data;
    this.log = logger.child("[format]", this.options.logLevel);
  }

  /**
   * Fields of a template, in order of appearance
   */
  parseFields(template: string): Result<FieldToken[], TemplateSyntaxError> {
    return map(tokenize(template), (tokens) =>
      tokens.filter((token): token is FieldToken => token.kind === "field")
    );
  }

  /**
   * Unique non-empty field names used by a template
   */
  getFieldNames(template: string): Result<string[], TemplateSyntaxError> {
    return map(this.parseFields(template), (fields) => [
      ...new Set(fields.map((field) => field.name).filter((name) => name !== "")),
    ]);
  }

  /**
   * Expand a template, resolving each field through the given resolver.
   * Output is all or nothing: on error no partial text is returned.
   */
  expand(template: string, resolver: ArgumentResolver): Result<string, FormatError> {
    const result = this.expandTokens(template, resolver);
    if (!result.success) {
      this.log.debug(`${result.error.code}: ${result.error.message}`);
    }
    return result;
  }

  private expandTokens(template: string, resolver: ArgumentResolver): Result<string, FormatError> {
    const tokens = tokenize(template);
    if (!tokens.success) {
      return tokens;
    }

    const out = new OutputBuffer();
    let numbering: Numbering | undefined;

    for (const token of tokens.data) {
      if (token.kind === "literal") {
        out.write(token.text);
        continue;
      }

      if (this.options.strictNumbering) {
        const current = this.numberingOf(token.name);
        if (current !== undefined) {
          if (numbering !== undefined && numbering !== current) {
            return err(this.numberingSwitchError(numbering, token));
          }
          numbering = current;
        }
      }

      const value = token.name === "" ? resolver.next() : resolver.resolve(token.name);
      if (!value.success) {
        return value;
      }

      const directive = parseSpec(token.spec);
      if (!directive.success) {
        return directive;
      }

      const rendered = renderValue(value.data, directive.data, out);
      if (!rendered.success) {
        return rendered;
      }
    }

    return ok(out.toString());
  }

  private numberingOf(name: string): Numbering | undefined {
    if (name === "") {
      return "automatic";
    }
    return INDEX_PATTERN.test(name) ? "manual" : undefined;
  }

  private numberingSwitchError(from: Numbering, token: FieldToken): TemplateSyntaxError {
    const message =
      from === "automatic"
        ? "Cannot switch from automatic field numbering to manual field specification"
        : "Cannot switch from manual field specification to automatic field numbering";
    return new TemplateSyntaxError(message, { field: token.match, position: token.startIndex });
  }

  /**
   * Expand against positional arguments: "{}" takes the next one, "{1}" a given one
   */
  format(template: string, ...args: unknown[]): Result<string, FormatError> {
    return this.expand(template, new PositionalResolver(args));
  }

  /**
   * Expand against a name-keyed mapping: "{name}"
   */
  formatMap(
    template: string,
    mapping: ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>
  ): Result<string, FormatError> {
    return this.expand(template, new KeyedResolver(mapping));
  }

  /**
   * Expand against the fields of an object: "{field}"
   */
  formatRecord(template: string, record: unknown): Result<string, FormatError> {
    const resolver = RecordResolver.create(record);
    if (!resolver.success) {
      this.log.debug(`${resolver.error.code}: ${resolver.error.message}`);
      return resolver;
    }
    return this.expand(template, resolver.data);
  }

  /**
   * Like format, but throws the FormatError
   */
  mustFormat(template: string, ...args: unknown[]): string {
    return unwrap(this.format(template, ...args));
  }

  /**
   * Like formatMap, but throws the FormatError
   */
  mustFormatMap(
    template: string,
    mapping: ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>
  ): string {
    return unwrap(this.formatMap(template, mapping));
  }

  /**
   * Like formatRecord, but throws the FormatError
   */
  mustFormatRecord(template: string, record: unknown): string {
    return unwrap(this.formatRecord(template, record));
  }
}

/**
 * Factory function to create a Formatter
 */
export function createFormatter(options?: FormatterOptionsInput): Formatter {
  return new Formatter(options);
}
