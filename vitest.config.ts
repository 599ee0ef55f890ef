import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
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
        // Pure type-only files (interfaces/types, no runtime logic)
        "src/proxy/types.ts",
        "src/inventory/types.ts",
        // Process entrypoint (signal wiring only)
        "src/index.ts",
      ],
    },
  },
});
