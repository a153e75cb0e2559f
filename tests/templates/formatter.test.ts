import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import {
  Formatter,
  createFormatter,
  format,
  formatMap,
  formatRecord,
  mustFormat,
  mustFormatMap,
  mustFormatRecord,
} from "@/templates/index.js";
import {
  ConversionError,
  ResolutionError,
  TemplateSyntaxError,
  ValidationError,
} from "@/lib/errors.js";
import { unwrap } from "@/lib/result.js";

class Point {
  constructor(
    public x: number,
    public y: number
  ) {}

  get norm(): number {
    return Math.hypot(this.x, this.y);
  }

  scale(): number {
    return this.x * this.y;
  }
}

describe("format", () => {
  it("fills automatic fields in order", () => {
    expect(unwrap(format("{} and {}", "a", "b"))).toBe("a and b");
  });

  it("reuses numbered fields", () => {
    expect(unwrap(format("{0} {1} {0}", "x", "y"))).toBe("x y x");
  });

  it("mixes automatic and numbered fields by default", () => {
    expect(unwrap(format("{} {0} {}", "a", "b"))).toBe("a a b");
  });

  it("applies format specifications", () => {
    expect(unwrap(format("{:>10}", 42))).toBe("        42");
    expect(unwrap(format("[{:^6}]", "ab"))).toBe("[  ab  ]");
    expect(unwrap(format("{:+d} {:+d}", 5, -5))).toBe("+5 -5");
    expect(unwrap(format("{:#x}", -10))).toBe("-0xa");
    expect(unwrap(format("{:.0%} {:.2%}", 0.5, 0.005))).toBe("50% 0.50%");
    expect(unwrap(format("{0:08.3f}|{0:e}", 3.14159))).toBe("0003.142|3.141590e+00");
  });

  it("renders small values at the highest precisions", () => {
    expect(unwrap(format("{:.100g} {:.100}", 0.0625, 0.0625))).toBe("0.0625 0.0625");
  });

  it("reads a dot without digits as precision zero", () => {
    expect(unwrap(format("{:.f}", 1.5))).toBe("2");
    expect(unwrap(format("[{:.}]", "abc"))).toBe("[]");
  });

  it("returns literal text unchanged", () => {
    expect(unwrap(format("plain text"))).toBe("plain text");
    expect(unwrap(format(""))).toBe("");
  });

  it("collapses escaped braces", () => {
    expect(unwrap(format("{{}}"))).toBe("{}");
    expect(unwrap(format("{{{}}}", 7))).toBe("{7}");
    expect(unwrap(format("a}}b{{c"))).toBe("a}b{c");
  });

  it("renders values without a spec naturally", () => {
    expect(unwrap(format("{} {} {} {}", null, true, [1, 2], { a: 1 }))).toBe(
      'null true [1,2] {"a":1}'
    );
  });

  describe("errors", () => {
    it("names a malformed specification", () => {
      const result = format("{:q}", 1);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(TemplateSyntaxError);
        expect(result.error.message).toBe("Invalid format specification: q");
      }
    });

    it("reports unmatched braces", () => {
      const closing = format("oops}", 1);
      const opening = format("{oops", 1);
      expect(closing.success).toBe(false);
      expect(opening.success).toBe(false);
      if (!closing.success && !opening.success) {
        expect(closing.error.message).toBe("Single '}' encountered in format string");
        expect(opening.error.message).toBe("Single '{' encountered in format string");
      }
    });

    it("reports missing positional arguments", () => {
      const result = format("{} {}", "only");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ResolutionError);
        expect(result.error.message).toBe("Format index (1) out of range (1)");
      }
    });

    it("reports conversion failures", () => {
      const result = format("{:d}", "text");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ConversionError);
      }
    });

    it("rejects oversized widths instead of throwing", () => {
      const templates = ["{:>99999999999999999999}", "{:99999999999999999999f}", "{:>1000000000}"];
      for (const template of templates) {
        const result = format(template, 1.5);
        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error).toBeInstanceOf(TemplateSyntaxError);
        }
      }
    });

    it("returns no partial output", () => {
      const result = format("ok {} then {:q}", 1, 2);
      expect(result).toEqual({ success: false, error: expect.any(TemplateSyntaxError) });
    });
  });
});

describe("formatMap", () => {
  it("resolves names from a record", () => {
    expect(unwrap(formatMap("{name} is {age:d}", { name: "Ada", age: 36 }))).toBe("Ada is 36");
  });

  it("resolves names from a map", () => {
    const values = new Map<string, unknown>([["total", 1234.5]]);
    expect(unwrap(formatMap("total={total:,>10.1f}", values))).toBe("total=,,,,1234.5");
  });

  it("names the missing key", () => {
    const result = formatMap("{nope}", {});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("KeyError: nope");
    }
  });

  it("refuses automatic fields", () => {
    expect(formatMap("{}", { a: 1 }).success).toBe(false);
  });
});

describe("formatRecord", () => {
  it("reads fields and getters", () => {
    const point = new Point(3, 4);
    expect(unwrap(formatRecord("({x}, {y}) |{norm:.1f}|", point))).toBe("(3, 4) |5.0|");
  });

  it("does not call methods", () => {
    const result = formatRecord("{scale}", new Point(1, 2));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("KeyError: scale");
    }
  });

  it("rejects a value that is not a record", () => {
    const result = formatRecord("{x}", 42);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ResolutionError);
      expect(result.error.message).toBe("formatRecord must be called with an object");
    }
  });
});

describe("throwing variants", () => {
  it("return the rendered text", () => {
    expect(mustFormat("{:>4}", 7)).toBe("   7");
    expect(mustFormatMap("{a}{b}", { a: 1, b: 2 })).toBe("12");
    expect(mustFormatRecord("{x}", new Point(1, 2))).toBe("1");
  });

  it("throw the format error", () => {
    expect(() => mustFormat("{:q}", 1)).toThrow(TemplateSyntaxError);
    expect(() => mustFormatMap("{a}", {})).toThrow("KeyError: a");
    expect(() => mustFormatRecord("{x}", "text")).toThrow(ResolutionError);
  });
});

describe("Formatter", () => {
  let formatter: Formatter;

  beforeEach(() => {
    formatter = createFormatter({ strictNumbering: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("strict numbering", () => {
    it("rejects switching from automatic to manual", () => {
      const result = formatter.format("{} {0}", "a");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(TemplateSyntaxError);
        expect(result.error.message).toBe(
          "Cannot switch from automatic field numbering to manual field specification"
        );
        expect(result.error.context).toEqual({ field: "{0}", position: 3 });
      }
    });

    it("rejects switching from manual to automatic", () => {
      const result = formatter.format("{0} {}", "a");
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(
          "Cannot switch from manual field specification to automatic field numbering"
        );
      }
    });

    it("accepts a single numbering style", () => {
      expect(unwrap(formatter.format("{} {}", "a", "b"))).toBe("a b");
      expect(unwrap(formatter.format("{1} {0}", "a", "b"))).toBe("b a");
    });

    it("ignores named fields", () => {
      expect(unwrap(formatter.formatMap("{a} {b}", { a: 1, b: 2 }))).toBe("1 2");
    });
  });

  describe("parseFields", () => {
    it("lists fields in order", () => {
      const fields = unwrap(formatter.parseFields("a{0:>3}b{name}"));
      expect(fields.map((field) => [field.name, field.spec])).toEqual([
        ["0", ">3"],
        ["name", ""],
      ]);
    });

    it("reports syntax errors", () => {
      expect(formatter.parseFields("{").success).toBe(false);
    });
  });

  it("lists unique field names", () => {
    expect(unwrap(formatter.getFieldNames("{a}{b}{a}{}{b:d}"))).toEqual(["a", "b"]);
  });

  it("rejects unknown options", () => {
    expect(() => createFormatter(JSON.parse('{"fill":"*"}'))).toThrow(ValidationError);
  });

  it("logs failures at debug level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const verbose = createFormatter({ logLevel: "debug" });

    verbose.format("{:q}", 1);

    expect(debug).toHaveBeenCalledTimes(1);
    expect(String(debug.mock.calls[0]?.[0])).toContain(
      "[format] SYNTAX_ERROR: Invalid format specification: q"
    );
  });

  it("stays quiet at the default level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    createFormatter({ logLevel: "info" }).format("{:q}", 1);
    expect(debug).not.toHaveBeenCalled();
  });
});
