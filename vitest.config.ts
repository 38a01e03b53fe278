import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    testTimeout: 10_000,
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts"],
      reporter: ["text", "json-summary"],
      reportsDirectory: "coverage",
    },
  },
  resolve: {
    alias: [
      // NodeNext imports name the emitted .js; tests load the .ts sources.
      { find: /^(\..+)\.js$/, replacement: "$1.ts" },
    ],
  },
});
