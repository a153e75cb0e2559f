/**
 * Base error class for all formatting errors
 */
export class FormatError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "FormatError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Malformed template brace structure or format specification
 */
export class TemplateSyntaxError extends FormatError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "SYNTAX_ERROR", context);
    this.name = "TemplateSyntaxError";
  }
}

/**
 * Missing or out-of-range argument
 */
export class ResolutionError extends FormatError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "RESOLUTION_ERROR", context);
    this.name = "ResolutionError";
  }
}

/**
 * Value cannot be rendered with the requested conversion
 */
export class ConversionError extends FormatError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONVERSION_ERROR", context);
    this.name = "ConversionError";
  }
}

/**
 * Error for schema validation failures
 */
export class ValidationError extends FormatError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}
