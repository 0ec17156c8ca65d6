/**
 * Copies a flat record without its null and undefined values
 */
export function removeNone<T>(
  record: Record<string, T | null | undefined>
): Record<string, T> {
  const result: Record<string, T> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== null && value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

if (import.meta.vitest) {
  const { describe, it, expect } = import.meta.vitest;

  describe("removeNone", () => {
    it("should drop null and undefined values", () => {
      expect(removeNone({ a: 1, b: null, c: undefined, d: 0 })).toEqual({ a: 1, d: 0 });
    });

    it("should keep falsy values other than null and undefined", () => {
      expect(removeNone({ a: "", b: false, c: 0 })).toEqual({ a: "", b: false, c: 0 });
    });

    it("should only look at the first level", () => {
      expect(removeNone({ a: { b: null } })).toEqual({ a: { b: null } });
    });
  });
}
