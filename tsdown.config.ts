import { defineConfig } from "tsdown";

export default defineConfig({
  entry: {
    index: "src/index.ts",
  },
  dts: true,
  define: {
    "import.meta.vitest": "undefined",
  },
});
