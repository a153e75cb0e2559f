import { Result, ok, err } from "../lib/result.js";
import { TemplateSyntaxError, ValidationError } from "../lib/errors.js";
import {
  Align,
  Directive,
  DirectiveInput,
  DirectiveSchema,
  MAX_WIDTH,
  Sign,
  Verb,
} from "./schema/index.js";

const ALIGN_TOKENS = new Map<string, Align>([
  ["<", "left"],
  [">", "right"],
  ["=", "padSign"],
  ["^", "center"],
]);

const SIGN_TOKENS = new Map<string, Sign>([
  ["+", "+"],
  ["-", "-"],
  [" ", " "],
]);

/**
 * Verb letters and the conversion each selects.
 * "d" and "%" carry extra effects applied in parseSpec.
 */
const VERB_TOKENS = new Map<string, Verb>([
  ["b", "binary"],
  ["d", "decimal"],
  ["o", "octal"],
  ["x", "hexLower"],
  ["X", "hexUpper"],
  ["e", "sciLower"],
  ["E", "sciUpper"],
  ["f", "fixedLower"],
  ["F", "fixedUpper"],
  ["g", "generalLower"],
  ["G", "generalUpper"],
  ["r", "repr"],
  ["t", "typeName"],
  ["s", "verbose"],
  ["%", "fixedLower"],
]);

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= "0" && char <= "9";
}

/**
 * Fresh directive with default rendering
 */
export function defaultDirective(): Directive {
  return {
    align: "none",
    sign: "-",
    showRadix: false,
    verb: "default",
    percent: false,
  };
}

/**
 * Build a directive from a plain object, filling in defaults
 */
export function createDirective(input: DirectiveInput = {}): Result<Directive, ValidationError> {
  const parsed = DirectiveSchema.safeParse(input);
  if (!parsed.success) {
    return err(
      new ValidationError("Invalid directive", {
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      })
    );
  }
  const directive = parsed.data;
  if (directive.verb === "decimal") {
    directive.showRadix = false;
  }
  if (directive.percent) {
    directive.verb = "fixedLower";
  }
  return ok(directive);
}

/**
 * Parse a format specification into a Directive.
 *
 * Grammar: [[fill]align][sign][#][0][width][.precision][verb]
 *
 * Each stage either consumes its token or is skipped; no stage looks back.
 * Input left over after the verb is a syntax error.
 *
 * @example
 * ```typescript
 * const result = parseSpec("*^+#012.3x");
 * ```
 */
export function parseSpec(spec: string): Result<Directive, TemplateSyntaxError> {
  const directive = defaultDirective();
  const chars = Array.from(spec);
  let i = 0;

  // Alignment, with an optional fill character before it
  const [first, second] = chars;
  const fillAlign = second === undefined ? undefined : ALIGN_TOKENS.get(second);
  const bareAlign = first === undefined ? undefined : ALIGN_TOKENS.get(first);
  if (first !== undefined && fillAlign !== undefined) {
    directive.fillChar = first;
    directive.align = fillAlign;
    i = 2;
  } else if (bareAlign !== undefined) {
    directive.align = bareAlign;
    i = 1;
  }
  const explicitAlign = i > 0;

  // Sign
  const sign = SIGN_TOKENS.get(chars[i] ?? "");
  if (sign !== undefined) {
    directive.sign = sign;
    i++;
  }

  // Radix marker
  if (chars[i] === "#") {
    directive.showRadix = true;
    i++;
  }

  // Zero padding never overrides an explicit fill or alignment
  if (chars[i] === "0") {
    if (directive.fillChar === undefined) {
      directive.fillChar = "0";
    }
    if (!explicitAlign) {
      directive.align = "padSign";
    }
    i++;
  }

  // Width
  const widthStart = i;
  while (isDigit(chars[i])) {
    i++;
  }
  if (i > widthStart) {
    const width = Number.parseInt(chars.slice(widthStart, i).join(""), 10);
    if (width > MAX_WIDTH) {
      return err(
        new TemplateSyntaxError(`Format width exceeds the maximum of ${MAX_WIDTH}: ${spec}`, {
          spec,
          maxWidth: MAX_WIDTH,
        })
      );
    }
    directive.minWidth = width;
  }

  // Precision; a bare "." means zero digits
  let emptyPrecision = false;
  if (chars[i] === ".") {
    i++;
    const precisionStart = i;
    while (isDigit(chars[i])) {
      i++;
    }
    emptyPrecision = i === precisionStart;
    const precision = emptyPrecision
      ? 0
      : Number.parseInt(chars.slice(precisionStart, i).join(""), 10);
    if (!Number.isSafeInteger(precision)) {
      return err(new TemplateSyntaxError(`Format precision too large: ${spec}`, { spec }));
    }
    directive.precision = precision;
  }

  // Verb
  const verbToken = chars[i] ?? "";
  const verb = VERB_TOKENS.get(verbToken);
  if (verb !== undefined) {
    directive.verb = verb;
    if (verbToken === "d") {
      directive.showRadix = false;
    } else if (verbToken === "%") {
      directive.percent = true;
    }
    i++;
  }

  if (i < chars.length) {
    return err(new TemplateSyntaxError(`Invalid format specification: ${spec}`, { spec }));
  }

  // The percent conversion rewrites the precision and needs real digits
  if (directive.percent && emptyPrecision) {
    return err(new TemplateSyntaxError(`Format specifier missing precision: ${spec}`, { spec }));
  }

  return ok(directive);
}
