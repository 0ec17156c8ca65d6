import { describe, it, expect } from "vitest";
import config, { noClass } from "./eslint.config.ts";

describe("eslint config", () => {
  it("should link the no-class rule to its docs in this repo", () => {
    expect(noClass.meta.docs?.url).toBe("docs/rules/no-class.md");
  });

  it("should turn the no-class rule off for error classes only", () => {
    const overrides = config.filter(
      (entry) => "rules" in entry && entry.rules?.["local/no-class"] === "off"
    );
    expect(overrides).toHaveLength(1);
    expect(overrides[0]).toMatchObject({ files: ["src/common/errors.ts"] });
  });
});
