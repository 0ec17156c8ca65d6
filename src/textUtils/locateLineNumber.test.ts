import { describe, it, expect } from "vitest";
import { locateLineNumber } from "./locateLineNumber.ts";

describe("locateLineNumber", () => {
  const contents = "a\nfoo\nb\nbar\n";

  it("should return the 1-based number of the first match", () => {
    expect(locateLineNumber(/bar/, contents)).toBe(4);
  });

  it("should match on the first line without a start trigger", () => {
    expect(locateLineNumber(/a/, contents)).toBe(1);
  });

  it("should not retest lines before the start trigger", () => {
    expect(locateLineNumber(/a/, contents, /foo/)).toBeUndefined();
  });

  it("should search after the start trigger", () => {
    expect(locateLineNumber(/b/, contents, /foo/)).toBe(3);
  });

  it("should return undefined when the start trigger never matches", () => {
    expect(locateLineNumber(/bar/, contents, /missing/)).toBeUndefined();
  });

  it("should return undefined when nothing matches", () => {
    expect(locateLineNumber(/baz/, contents)).toBeUndefined();
  });

  it("should count blank lines", () => {
    const text = "first\n\n   \nsecond";
    expect(locateLineNumber(/second/, text)).toBe(4);
  });

  it("should never match a blank line", () => {
    const text = "first\n\nsecond";
    expect(locateLineNumber(/\s*/, text, /first/)).toBe(3);
  });

  it("should stop at the stop trigger after arming", () => {
    const text = [
      "class X:",
      "    def x(self):",
      "class Z:",
      "    def y(self):",
    ].join("\n");
    expect(locateLineNumber(/\s+def y/, text, /class X/, /class /)).toBeUndefined();
    expect(locateLineNumber(/\s+def x/, text, /class X/, /class /)).toBe(2);
  });

  it("should continue past the stop trigger before arming", () => {
    const text = ["end", "begin", "", "target"].join("\n");
    expect(locateLineNumber(/target/, text, /begin/, /end/)).toBe(4);
  });

  it("should match lines with trailing carriage returns", () => {
    expect(locateLineNumber(/two/, "one\r\ntwo\r\n")).toBe(2);
  });
});
