import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Clear model/secret env vars so tests run against deterministic defaults.
    // Tests that need a specific config build one with makeConfig().
    env: {
      GEMINI_API_KEY: "",
      CHRONICLE_MODEL: "",
      CHRONICLE_SYSTEM_PROMPT_FILE: "",
      CHRONICLE_HISTORY_LIMIT: "",
      CHRONICLE_MAX_ATTEMPTS: "",
      CHRONICLE_BACKOFF_UNIT_MS: "",
      CHRONICLE_LOG_LEVEL: "",
      CHRONICLE_DEBUG: "",
    },
    coverage: {
      provider: "v8",
      include: ["src/server/**/*.ts"],
      reporter: ["text", "text-summary", "lcov"],
      thresholds: {
        // boot() and shutdown() are integration-level (real ports, process.exit)
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
        perFile: false,
      },
    },
    pool: "forks",
    testTimeout: 10000,
  },
});
