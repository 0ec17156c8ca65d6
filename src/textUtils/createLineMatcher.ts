export type LineMatcher = (line: string) => boolean;

/**
 * Creates a predicate that tests a pattern at the start of a line.
 * The match is anchored at index 0 but does not have to consume the whole line.
 * The caller's RegExp is left untouched; the global flag is ignored.
 * @param pattern Pattern to anchor
 * @returns Predicate for a single line
 */
export function createLineMatcher(pattern: RegExp): LineMatcher {
  const flags = pattern.flags.replace(/[gy]/g, "");
  const anchored = new RegExp(pattern.source, `${flags}y`);
  return (line) => {
    anchored.lastIndex = 0;
    return anchored.test(line);
  };
}

if (import.meta.vitest) {
  const { describe, it, expect } = import.meta.vitest;

  describe("createLineMatcher", () => {
    it("should match at the start of the line", () => {
      const matches = createLineMatcher(/class X/);
      expect(matches("class X {")).toBe(true);
    });

    it("should not match later in the line", () => {
      const matches = createLineMatcher(/bar/);
      expect(matches("foo bar")).toBe(false);
    });

    it("should not require the whole line to match", () => {
      const matches = createLineMatcher(/foo/);
      expect(matches("foobar")).toBe(true);
    });

    it("should anchor every alternative", () => {
      const matches = createLineMatcher(/a|b/);
      expect(matches("xb")).toBe(false);
      expect(matches("bx")).toBe(true);
    });

    it("should keep flags other than global", () => {
      const matches = createLineMatcher(/CLASS/gi);
      expect(matches("class X")).toBe(true);
      expect(matches("class X")).toBe(true);
    });

    it("should not touch lastIndex of the given pattern", () => {
      const pattern = /foo/g;
      pattern.lastIndex = 2;
      const matches = createLineMatcher(pattern);
      expect(matches("foo")).toBe(true);
      expect(pattern.lastIndex).toBe(2);
    });

    it("should be reusable after a successful match", () => {
      const matches = createLineMatcher(/ab/);
      expect(matches("abc")).toBe(true);
      expect(matches("abd")).toBe(true);
    });
  });
}
