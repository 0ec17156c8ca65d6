import {
  parseOptions,
  printableCredOptionsSchema,
  type PrintableCredOptions,
} from "../common/schemas.ts";

/**
 * Masks a credential for logging, e.g. "test-secret" -> "t****t".
 * The mask has a fixed length so the credential's length is not revealed.
 * Credentials shorter than twice the visible count are returned unchanged.
 */
export function printableCred(
  cred: string,
  options: PrintableCredOptions = {}
): string {
  const resolved = parseOptions(printableCredOptionsSchema, options);
  const visible = Math.max(resolved.visible, 1);
  const maskChar = resolved.maskChar || "*";

  if (cred.length < visible * 2) {
    return cred;
  }
  return `${cred.slice(0, visible)}${maskChar.repeat(resolved.maskCharCount)}${cred.slice(-visible)}`;
}

if (import.meta.vitest) {
  const { describe, it, expect } = import.meta.vitest;

  describe("printableCred", () => {
    it("should mask with defaults", () => {
      expect(printableCred("test-secret")).toBe("t****t");
    });

    it("should keep the configured number of characters visible", () => {
      expect(printableCred("test-secret", { visible: 3 })).toBe("tes****ret");
    });

    it("should use at least one visible character", () => {
      expect(printableCred("test-secret", { visible: 0 })).toBe("t****t");
    });

    it("should use the configured mask", () => {
      expect(printableCred("test-secret", { maskChar: "#", maskCharCount: 2 })).toBe("t##t");
    });

    it("should fall back to * for an empty mask character", () => {
      expect(printableCred("test-secret", { maskChar: "" })).toBe("t****t");
    });

    it("should mask a credential exactly twice the visible length", () => {
      expect(printableCred("ab")).toBe("a****b");
    });

    it("should return short credentials unchanged", () => {
      expect(printableCred("a")).toBe("a");
      expect(printableCred("abcde", { visible: 3 })).toBe("abcde");
    });
  });
}
