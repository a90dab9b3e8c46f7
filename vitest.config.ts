import * as path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@texnames/engine": path.resolve(__dirname, "engine/src/index.ts"),
      "@texnames/catalog": path.resolve(__dirname, "catalog/src/index.ts"),
    },
  },
  test: {
    root: ".",
    include: [
      "engine/tests/**/*.test.ts",
      "catalog/tests/**/*.test.ts",
      "cli/tests/**/*.test.ts",
    ],
    globals: false,
    testTimeout: 10000,
  },
});
