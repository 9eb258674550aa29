import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    target: [
      "es2022",
      "node20",
    ],
  },
  test: {
    include: [
      "tests/**/*.test.ts",
    ],
  },
});
