import { inspect } from "node:util";

import { Result, ok, err } from "../lib/result.js";
import { ConversionError } from "../lib/errors.js";
import type { Sign, Verb } from "./schema/index.js";

/**
 * Largest precision the host float conversions accept
 */
export const MAX_PRECISION = 100;

const DEFAULT_FLOAT_PRECISION = 6;

/**
 * Options for a single base conversion
 */
export interface ConvertOptions {
  verb: Verb;
  sign: Sign;
  /** Emit 0x / 0X after the sign for hex verbs */
  alternate?: boolean;
  /** Right-justify with spaces to this width */
  width?: number;
  precision?: number;
}

const RADIX: Partial<Record<Verb, number>> = {
  binary: 2,
  octal: 8,
  decimal: 10,
  hexLower: 16,
  hexUpper: 16,
};

const INSPECT_OPTIONS = { depth: null, breakLength: Infinity } as const;

/**
 * Name of a value's type: "number", "string", "null", "Array", a class name...
 */
export function typeName(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "object") {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null) {
      return "Object";
    }
    const ctor: unknown = value.constructor;
    return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "Object";
  }
  return typeof value;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Natural rendering of a value with no verb
 */
export function naturalString(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || typeof value !== "object") {
    return String(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }
  if (Array.isArray(value) || isPlainObject(value)) {
    return JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v
    );
  }
  if (value.toString !== Object.prototype.toString) {
    return String(value);
  }
  return inspect(value, INSPECT_OPTIONS);
}

function signPrefix(negative: boolean, sign: Sign): string {
  if (negative) {
    return "-";
  }
  return sign === "-" ? "" : sign;
}

/**
 * Widen an exponent to at least two digits: 1e+6 -> 1e+06
 */
function widenExponent(text: string): string {
  return text.replace(/e([+-])(\d)$/, "e$10$2");
}

function fixed(magnitude: number, precision: number): string {
  // toFixed switches to exponent notation from 1e21 on
  if (magnitude >= 1e21) {
    const digits = BigInt(magnitude).toString();
    return precision > 0 ? `${digits}.${"0".repeat(precision)}` : digits;
  }
  return magnitude.toFixed(precision);
}

function exponent(magnitude: number, precision: number): string {
  return widenExponent(magnitude.toExponential(precision));
}

/**
 * General format: exponent notation when the exponent is below -4 or not
 * below the precision, fixed otherwise; trailing zeros removed.
 */
function general(magnitude: number, precision: number): string {
  const significant = precision === 0 ? 1 : precision;
  if (magnitude === 0) {
    return "0";
  }
  const probe = magnitude.toExponential(significant - 1);
  const exp = Number.parseInt(probe.slice(probe.indexOf("e") + 1), 10);
  if (exp < -4 || exp >= significant) {
    const [mantissa = "", power = ""] = probe.split("e");
    return widenExponent(`${stripZeros(mantissa)}e${power}`);
  }
  // toPrecision only switches to exponent notation below 1e-6 or at the precision
  return stripZeros(magnitude.toPrecision(significant));
}

function stripZeros(text: string): string {
  if (!text.includes(".")) {
    return text;
  }
  return text.replace(/0+$/, "").replace(/\.$/, "");
}

function toFloat(value: unknown): number | undefined {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  return undefined;
}

function convertFloat(value: unknown, options: ConvertOptions): Result<string, ConversionError> {
  const { verb, sign } = options;
  const n = toFloat(value);
  if (n === undefined) {
    return err(
      new ConversionError(`Cannot render ${typeName(value)} with a floating-point conversion`, {
        verb,
        type: typeName(value),
      })
    );
  }
  const precision = options.precision ?? DEFAULT_FLOAT_PRECISION;
  if (precision > MAX_PRECISION) {
    return err(
      new ConversionError(`Precision ${precision} exceeds the maximum of ${MAX_PRECISION}`, {
        precision,
      })
    );
  }

  const negative = n < 0 || Object.is(n, -0);
  const magnitude = Math.abs(n);
  let body: string;
  if (Number.isNaN(n)) {
    body = "nan";
  } else if (!Number.isFinite(n)) {
    body = "inf";
  } else if (verb === "fixedLower" || verb === "fixedUpper") {
    body = fixed(magnitude, precision);
  } else if (verb === "sciLower" || verb === "sciUpper") {
    body = exponent(magnitude, precision);
  } else {
    body = general(magnitude, precision);
  }

  let text = signPrefix(negative && !Number.isNaN(n), sign) + body;
  if (verb === "fixedUpper" || verb === "sciUpper" || verb === "generalUpper") {
    text = text.toUpperCase();
  }
  return ok(text.padStart(options.width ?? 0, " "));
}

function convertInteger(value: unknown, options: ConvertOptions): Result<string, ConversionError> {
  const { verb, sign } = options;
  let n: bigint;
  if (typeof value === "bigint") {
    n = value;
  } else if (typeof value === "number" && Number.isInteger(value)) {
    n = BigInt(value);
  } else {
    return err(
      new ConversionError(`Cannot render ${typeName(value)} ${naturalString(value)} as an integer`, {
        verb,
        type: typeName(value),
      })
    );
  }

  const negative = n < 0n;
  let digits = (negative ? -n : n).toString(RADIX[verb] ?? 10);
  let radixMarker = "";
  if (options.alternate === true && (verb === "hexLower" || verb === "hexUpper")) {
    radixMarker = "0x";
  }
  if (verb === "hexUpper") {
    digits = digits.toUpperCase();
    radixMarker = radixMarker.toUpperCase();
  }
  return ok(signPrefix(negative, sign) + radixMarker + digits);
}

function convertDefault(value: unknown, options: ConvertOptions): Result<string, ConversionError> {
  const { sign, precision } = options;
  if (typeof value === "number") {
    if (precision !== undefined) {
      return convertFloat(value, { ...options, verb: "generalLower", width: undefined });
    }
    if (Number.isNaN(value)) {
      return ok("nan");
    }
    const negative = value < 0 || Object.is(value, -0);
    const magnitude = Math.abs(value);
    const body = Number.isFinite(magnitude) ? String(magnitude) : "inf";
    return ok(signPrefix(negative, sign) + body);
  }
  if (typeof value === "bigint") {
    return convertInteger(value, { ...options, verb: "decimal" });
  }
  const text = naturalString(value);
  return ok(precision === undefined ? text : truncate(text, precision));
}

function truncate(text: string, precision: number): string {
  return Array.from(text).slice(0, precision).join("");
}

/**
 * Convert one value to text for the given verb.
 *
 * Integer verbs take integral numbers and bigints, float verbs take numbers
 * and bigints. "repr" and "verbose" go through util.inspect on one line.
 */
export function convertValue(value: unknown, options: ConvertOptions): Result<string, ConversionError> {
  switch (options.verb) {
    case "binary":
    case "octal":
    case "decimal":
    case "hexLower":
    case "hexUpper":
      return convertInteger(value, options);
    case "sciLower":
    case "sciUpper":
    case "fixedLower":
    case "fixedUpper":
    case "generalLower":
    case "generalUpper":
      return convertFloat(value, options);
    case "repr":
      return ok(inspect(value, INSPECT_OPTIONS));
    case "typeName":
      return ok(typeName(value));
    case "verbose": {
      const text = typeof value === "string" ? value : inspect(value, INSPECT_OPTIONS);
      return ok(options.precision === undefined ? text : truncate(text, options.precision));
    }
    case "default":
      return convertDefault(value, options);
  }
}
