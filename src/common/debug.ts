/**
 * Debug logging for the helpers.
 *
 * Output goes to stderr so that callers piping formatted code to stdout are
 * not affected. Messages are dropped unless CODE_OPS_DEBUG is "true" or "1".
 *
 * @example
 * debug("Formatting failed:", error);
 */
export function debug(...args: unknown[]): void {
  if (!isDebugEnabled()) {
    return;
  }
  console.error("[code-ops]", ...args);
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.CODE_OPS_DEBUG;
  return value === "true" || value === "1";
}

if (import.meta.vitest) {
  const { describe, it, expect } = import.meta.vitest;

  describe("isDebugEnabled", () => {
    it("should be enabled by true or 1", () => {
      expect(isDebugEnabled({ CODE_OPS_DEBUG: "true" })).toBe(true);
      expect(isDebugEnabled({ CODE_OPS_DEBUG: "1" })).toBe(true);
    });

    it("should be disabled otherwise", () => {
      expect(isDebugEnabled({})).toBe(false);
      expect(isDebugEnabled({ CODE_OPS_DEBUG: "yes" })).toBe(false);
      expect(isDebugEnabled({ CODE_OPS_DEBUG: "0" })).toBe(false);
    });
  });
}
