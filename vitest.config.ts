import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
      },
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // Process entry point: wiring only.
        "src/index.ts",
        // Pure type-only files (interfaces/types, no runtime logic)
        "src/auth/repository-types.ts",
        "src/auth/session-repository.ts",
      ],
    },
  },
});
