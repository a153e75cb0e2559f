import { Result, ok, err, andThen, map } from "../lib/result.js";
import { ConversionError, FormatError } from "../lib/errors.js";
import { OutputBuffer } from "./buffer.js";
import { MAX_PRECISION, convertValue } from "./primitives.js";
import { FLOAT_VERBS, INTEGER_VERBS } from "./schema/index.js";
import type { Align, Directive } from "./schema/index.js";

/**
 * Fraction digits a percent conversion shows when no precision is given
 */
const DEFAULT_PERCENT_PRECISION = 6;

/**
 * Largest precision a percent conversion accepts, leaving room for the two
 * digits moved in front of the decimal point
 */
const MAX_PERCENT_PRECISION = MAX_PRECISION - 2;

const SIGN_CHARS = new Set(["-", "+", " "]);

function leadingSign(text: string): string {
  const first = text.charAt(0);
  return SIGN_CHARS.has(first) ? first : "";
}

/**
 * Shift the decimal point of an already rendered number two places to the
 * right and append "%". Works on the digits so no float rounding creeps in.
 *
 * @example
 * ```typescript
 * transformPercent("0.0050"); // "0.50%"
 * transformPercent("-0.250"); // "-25.0%"
 * ```
 */
export function transformPercent(text: string): Result<string, ConversionError> {
  const sign = leadingSign(text);
  const body = text.slice(sign.length);
  const dot = body.indexOf(".");

  if (dot === -1) {
    // nan and inf carry no digits to shift
    return ok(/^\d+$/.test(body) ? `${sign}${body}00%` : `${sign}${body}%`);
  }

  const integerPart = body.slice(0, dot);
  const fraction = body.slice(dot + 1);
  if (!/^\d+$/.test(integerPart) || !/^\d*$/.test(fraction)) {
    return err(new ConversionError(`Cannot apply percent conversion to ${text}`, { text }));
  }

  const shifted = fraction.slice(0, 2).padEnd(2, "0");
  const rest = fraction.slice(2);
  const suffix = rest === "" ? "" : `.${rest}`;

  if (/^0+$/.test(integerPart)) {
    const lead = shifted.startsWith("0") ? shifted.slice(1) : shifted;
    return ok(`${sign}${lead}${suffix}%`);
  }
  return ok(`${sign}${integerPart}${shifted}${suffix}%`);
}

/**
 * Literal base prefix spliced in after the sign, for binary and octal
 */
function radixPrefix(directive: Directive): string {
  if (!directive.showRadix) {
    return "";
  }
  if (directive.verb === "binary") {
    return "0b";
  }
  if (directive.verb === "octal") {
    return "0o";
  }
  return "";
}

function spliceRadixPrefix(text: string, prefix: string, directive: Directive): string {
  const trimmed = text.replace(/^ +/, "");
  const first = trimmed.charAt(0);
  if (first === "-" || first === "+") {
    return first + prefix + trimmed.slice(1);
  }
  if (directive.sign === " ") {
    return ` ${prefix}${trimmed}`;
  }
  return prefix + trimmed;
}

/**
 * Alignment used when a width is given without one: numbers to the right,
 * everything else to the left
 */
function resolveAlign(value: unknown, directive: Directive): Align {
  if (directive.align !== "none" || directive.minWidth === undefined) {
    return directive.align;
  }
  return typeof value === "number" || typeof value === "bigint" ? "right" : "left";
}

/**
 * Render one value according to a directive, appending to the buffer.
 *
 * Nothing is written when the conversion fails.
 */
export function renderValue(
  value: unknown,
  directive: Directive,
  out: OutputBuffer
): Result<void, FormatError> {
  if (
    directive.percent &&
    directive.precision !== undefined &&
    directive.precision > MAX_PERCENT_PRECISION
  ) {
    return err(
      new ConversionError(
        `Percent precision ${directive.precision} exceeds the maximum of ${MAX_PERCENT_PRECISION}`,
        { precision: directive.precision }
      )
    );
  }

  const precision = directive.percent
    ? (directive.precision ?? DEFAULT_PERCENT_PRECISION) + 2
    : directive.precision;

  const prefix = radixPrefix(directive);
  const alternate =
    directive.showRadix && (directive.verb === "hexLower" || directive.verb === "hexUpper");
  const isFloat = FLOAT_VERBS.has(directive.verb);
  let width = directive.minWidth ?? 0;

  const converted = convertValue(value, {
    verb: directive.verb,
    sign: directive.sign,
    alternate,
    width: isFloat ? directive.minWidth : undefined,
    precision,
  });

  const rendered = andThen(converted, (base): Result<string, ConversionError> => {
    let text = base;
    if (prefix !== "") {
      text = spliceRadixPrefix(text, prefix, directive);
    }
    if (isFloat) {
      text = text.trim();
      if (directive.sign === " " && !text.startsWith("-")) {
        text = ` ${text}`;
      }
    }
    return directive.percent ? transformPercent(text) : ok(text);
  });
  if (!rendered.success) {
    return rendered;
  }

  let text = rendered.data;
  const align = resolveAlign(value, directive);
  const fillChar = directive.fillChar ?? " ";

  if (align === "left" || align === "padSign") {
    const sign = leadingSign(text);
    if (sign !== "") {
      out.write(sign);
      text = text.slice(1);
      width -= 1;
    }
  }

  const hasRadixMarker =
    directive.showRadix && INTEGER_VERBS.has(directive.verb) && directive.verb !== "decimal";
  if (hasRadixMarker && align === "padSign") {
    out.write(text.slice(0, 2));
    out.writeAligned(text.slice(2), align, width - 2, fillChar);
  } else {
    out.writeAligned(text, align, width, fillChar);
  }
  return ok(undefined);
}

/**
 * Render one value to a string
 */
export function renderToString(value: unknown, directive: Directive): Result<string, FormatError> {
  const out = new OutputBuffer();
  return map(renderValue(value, directive, out), () => out.toString());
}
