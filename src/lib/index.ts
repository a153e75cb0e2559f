// Error classes
export {
  FormatError,
  TemplateSyntaxError,
  ResolutionError,
  ConversionError,
  ValidationError,
} from "./errors.js";

// Result type and utilities
export {
  ok,
  err,
  unwrap,
  map,
  andThen,
} from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, LOG_LEVELS } from "./logger.js";
export type { LogLevel, Logger } from "./logger.js";
