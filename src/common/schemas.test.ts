import { describe, it, expect } from "vitest";
import {
  formatCodeOptionsSchema,
  parseOptions,
  printableCredOptionsSchema,
} from "./schemas.ts";
import { CodeUtilsError } from "./errors.ts";

describe("schemas", () => {
  describe("formatCodeOptionsSchema", () => {
    it("should fill in defaults", () => {
      expect(formatCodeOptionsSchema.parse({})).toEqual({
        indentSize: 4,
        convertTabsToSpaces: true,
        organizeImports: true,
        semicolons: "ignore",
      });
    });

    it("should reject unknown semicolon preferences", () => {
      expect(formatCodeOptionsSchema.safeParse({ semicolons: "always" }).success).toBe(false);
    });
  });

  describe("printableCredOptionsSchema", () => {
    it("should fill in defaults", () => {
      expect(printableCredOptionsSchema.parse({})).toEqual({
        visible: 1,
        maskChar: "*",
        maskCharCount: 4,
      });
    });
  });

  describe("parseOptions", () => {
    it("should return parsed options", () => {
      expect(parseOptions(formatCodeOptionsSchema, { indentSize: 2 }).indentSize).toBe(2);
    });

    it("should throw INVALID_OPTIONS with the failing path", () => {
      try {
        parseOptions(printableCredOptionsSchema, { maskCharCount: 1.5 });
        expect.unreachable("parseOptions should throw");
      } catch (error) {
        expect(error).toBeInstanceOf(CodeUtilsError);
        if (error instanceof CodeUtilsError) {
          expect(error.code).toBe("INVALID_OPTIONS");
          expect(error.message).toMatch(/^Invalid options: maskCharCount: /);
        }
      }
    });
  });
});
