import { z } from "zod";

/**
 * Options accepted by createFormatter
 */
export const FormatterOptionsSchema = z
  .object({
    /** Reject templates mixing "{}" and "{0}" fields */
    strictNumbering: z.boolean().default(false),

    /** Level for this formatter's own logger (defaults to the global one) */
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
  })
  .strict();

export type FormatterOptions = z.infer<typeof FormatterOptionsSchema>;
export type FormatterOptionsInput = z.input<typeof FormatterOptionsSchema>;
