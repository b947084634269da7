import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
    // PGlite boots a full Postgres in WASM per test file
    testTimeout: 30_000,
    hookTimeout: 30_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // Pure type-only files
        "src/account/repository-types.ts",
        "src/gateway/providers/types.ts",
        "src/test/**",
        // Process entry point
        "src/index.ts",
      ],
    },
  },
});
