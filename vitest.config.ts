import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    includeSource: ["src/**/*.ts"],
    include: ["src/**/*.test.ts", "eslint.config.test.ts"],
    testTimeout: 20000,
  },
});
