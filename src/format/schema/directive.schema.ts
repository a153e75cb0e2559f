import { z } from "zod";

/**
 * Field alignment
 * - none: no padding unless a width asks for natural alignment
 * - padSign: padding goes between the sign and the digits
 */
export const AlignSchema = z.enum(["none", "left", "right", "padSign", "center"]);

/**
 * Sign mode: "-" only marks negatives, "+" marks every number,
 * " " puts a space in front of non-negatives
 */
export const SignSchema = z.enum(["-", "+", " "]);

/**
 * Conversion kinds selected by the trailing verb letter
 */
export const VerbSchema = z.enum([
  "default",
  "binary",
  "octal",
  "hexLower",
  "hexUpper",
  "decimal",
  "sciLower",
  "sciUpper",
  "fixedLower",
  "fixedUpper",
  "generalLower",
  "generalUpper",
  "repr",
  "typeName",
  "verbose",
]);

/**
 * Widest field a format specification may ask for
 */
export const MAX_WIDTH = 1_000_000;

/**
 * Structured form of a field's format specification
 */
export const DirectiveSchema = z
  .object({
    /** Single code point used for padding; unset means space */
    fillChar: z
      .string()
      .refine((s) => Array.from(s).length === 1, "Fill must be a single character")
      .optional(),

    align: AlignSchema.default("none"),

    sign: SignSchema.default("-"),

    /** Emit a base prefix (0b, 0o, 0x) for integer verbs */
    showRadix: z.boolean().default(false),

    minWidth: z.number().int().nonnegative().max(MAX_WIDTH).optional(),

    precision: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).optional(),

    verb: VerbSchema.default("default"),

    /** Multiply by 100 and append "%" (implies fixed-point) */
    percent: z.boolean().default(false),
  })
  .strict();

export type Align = z.infer<typeof AlignSchema>;
export type Sign = z.infer<typeof SignSchema>;
export type Verb = z.infer<typeof VerbSchema>;
export type Directive = z.infer<typeof DirectiveSchema>;
export type DirectiveInput = z.input<typeof DirectiveSchema>;

/**
 * Verbs whose width is honored by the numeric conversion itself
 */
export const FLOAT_VERBS: ReadonlySet<Verb> = new Set<Verb>([
  "sciLower",
  "sciUpper",
  "fixedLower",
  "fixedUpper",
  "generalLower",
  "generalUpper",
]);

export const INTEGER_VERBS: ReadonlySet<Verb> = new Set<Verb>([
  "binary",
  "octal",
  "hexLower",
  "hexUpper",
  "decimal",
]);
