import { describe, it, expect } from "vitest";
import {
  utilOk,
  utilErr,
  tryCatchSync,
  formatError,
  type UtilError,
} from "./errorHandling.ts";

describe("errorHandling", () => {
  describe("utilOk", () => {
    it("should create success result", () => {
      const result = utilOk("success");
      expect(result.isOk()).toBe(true);
      expect(result._unsafeUnwrap()).toBe("success");
    });
  });

  describe("utilErr", () => {
    it("should create error result", () => {
      const result = utilErr("Something went wrong");
      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr()).toEqual({
        error: "Something went wrong",
        details: undefined,
      });
    });

    it("should keep error details", () => {
      const details = new Error("cause");
      const result = utilErr("Wrapped", details);
      expect(result._unsafeUnwrapErr().details).toBe(details);
    });
  });

  describe("tryCatchSync", () => {
    it("should return value of a successful operation", () => {
      const result = tryCatchSync(() => 42, "Should not fail");
      expect(result._unsafeUnwrap()).toBe(42);
    });

    it("should capture thrown errors", () => {
      const thrown = new Error("boom");
      const result = tryCatchSync(() => {
        throw thrown;
      }, "Operation failed");
      expect(result._unsafeUnwrapErr()).toEqual({
        error: "Operation failed",
        details: thrown,
      });
    });
  });

  describe("formatError", () => {
    it("should format error without details", () => {
      const error: UtilError = { error: "Simple error" };
      expect(formatError(error)).toBe("Simple error");
    });

    it("should format error with Error details", () => {
      const error: UtilError = {
        error: "Operation failed",
        details: new Error("Connection refused"),
      };
      expect(formatError(error)).toBe("Operation failed: Connection refused");
    });

    it("should ignore non-Error details", () => {
      const error: UtilError = { error: "Invalid input", details: { field: "x" } };
      expect(formatError(error)).toBe("Invalid input");
    });
  });
});
