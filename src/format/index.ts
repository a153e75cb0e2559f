export { OutputBuffer, codePointLength } from "./buffer.js";
export { parseSpec, createDirective, defaultDirective } from "./spec-parser.js";
export { renderValue, renderToString, transformPercent } from "./renderer.js";
export { convertValue, naturalString, typeName, MAX_PRECISION } from "./primitives.js";
export type { ConvertOptions } from "./primitives.js";
export * from "./schema/index.js";
