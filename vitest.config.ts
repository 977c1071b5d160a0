import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts", "tests/**/*.test.ts"],
    setupFiles: ["test/setup/unit.ts"],
    clearMocks: true,
    unstubEnvs: true,
    pool: "threads",
    coverage: {
      provider: "v8",
      all: true,
      reporter: ["text", "json-summary", "html"],
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.d.ts",
        "src/**/types.ts",
        "src/scripts/**",
        "src/server.ts"
      ],
      thresholds: {
        functions: 90,
        lines: 85,
        statements: 85,
        branches: 80
      }
    }
  }
});
