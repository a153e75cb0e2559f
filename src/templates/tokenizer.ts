import { Result, ok, err } from "../lib/result.js";
import { TemplateSyntaxError } from "../lib/errors.js";

/**
 * Run of literal text, with doubled braces already collapsed
 */
export interface LiteralToken {
  kind: "literal";
  text: string;
}

/**
 * Replacement field: {name:spec}
 */
export interface FieldToken {
  kind: "field";
  /** Text before the first ":"; empty means the next positional argument */
  name: string;
  /** Text after the first ":"; empty means default rendering */
  spec: string;
  /** Full field including braces */
  match: string;
  /** Index of the opening brace */
  startIndex: number;
  /** Index just past the closing brace */
  endIndex: number;
}

export type TemplateToken = LiteralToken | FieldToken;

/**
 * Split a field body at its first ":"
 */
export function splitField(body: string): { name: string; spec: string } {
  const colon = body.indexOf(":");
  if (colon === -1) {
    return { name: body, spec: "" };
  }
  return { name: body.slice(0, colon), spec: body.slice(colon + 1) };
}

/**
 * Split a template into literal runs and replacement fields.
 *
 * "{{" and "}}" become literal braces. A single "}" outside a field, or a
 * "{" with no closing brace, is a syntax error.
 */
export function tokenize(template: string): Result<TemplateToken[], TemplateSyntaxError> {
  const tokens: TemplateToken[] = [];
  let literal = "";
  let i = 0;

  const flushLiteral = (): void => {
    if (literal !== "") {
      tokens.push({ kind: "literal", text: literal });
      literal = "";
    }
  };

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === "}") {
      if (template.charAt(i + 1) !== "}") {
        return err(
          new TemplateSyntaxError("Single '}' encountered in format string", {
            template,
            position: i,
          })
        );
      }
      literal += "}";
      i += 2;
      continue;
    }

    if (char !== "{") {
      literal += char;
      i++;
      continue;
    }

    if (template.charAt(i + 1) === "{") {
      literal += "{";
      i += 2;
      continue;
    }

    const close = template.indexOf("}", i + 1);
    if (close === -1) {
      return err(
        new TemplateSyntaxError("Single '{' encountered in format string", {
          template,
          position: i,
        })
      );
    }

    flushLiteral();
    const { name, spec } = splitField(template.slice(i + 1, close));
    tokens.push({
      kind: "field",
      name,
      spec,
      match: template.slice(i, close + 1),
      startIndex: i,
      endIndex: close + 1,
    });
    i = close + 1;
  }

  flushLiteral();
  return ok(tokens);
}
