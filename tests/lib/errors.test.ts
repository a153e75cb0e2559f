import { describe, it, expect } from "vitest";
import {
  FormatError,
  TemplateSyntaxError,
  ResolutionError,
  ConversionError,
  ValidationError,
} from "../../src/lib/errors.js";

describe("Error Classes", () => {
  describe("FormatError", () => {
    it("should create a basic error", () => {
      const error = new FormatError("Test message", "TEST_CODE");
      expect(error.message).toBe("Test message");
      expect(error.name).toBe("FormatError");
      expect(error.code).toBe("TEST_CODE");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(FormatError);
    });

    it("should include context when provided", () => {
      const context = { spec: "q" };
      const error = new FormatError("Test message", "TEST_CODE", context);
      expect(error.context).toBe(context);
    });

    it("should have proper stack trace", () => {
      const error = new FormatError("Test message", "TEST_CODE");
      expect(error.stack).toBeDefined();
      expect(error.stack).toContain("FormatError");
      expect(error.stack).toContain("Test message");
    });

    it("should serialize to JSON", () => {
      const error = new FormatError("Test message", "TEST_CODE", { index: 3 });
      expect(error.toJSON()).toEqual({
        name: "FormatError",
        code: "TEST_CODE",
        message: "Test message",
        context: { index: 3 },
      });
    });
  });

  describe("subclasses", () => {
    it.each([
      [TemplateSyntaxError, "TemplateSyntaxError", "SYNTAX_ERROR"],
      [ResolutionError, "ResolutionError", "RESOLUTION_ERROR"],
      [ConversionError, "ConversionError", "CONVERSION_ERROR"],
      [ValidationError, "ValidationError", "VALIDATION_ERROR"],
    ] as const)("%o carries its name and code", (ErrorClass, name, code) => {
      const error = new ErrorClass("Something failed", { key: "value" });
      expect(error.name).toBe(name);
      expect(error.code).toBe(code);
      expect(error.context).toEqual({ key: "value" });
      expect(error).toBeInstanceOf(FormatError);
      expect(error).toBeInstanceOf(ErrorClass);
    });

    it("leaves context undefined when omitted", () => {
      const error = new ResolutionError("KeyError: name");
      expect(error.context).toBeUndefined();
    });
  });
});
