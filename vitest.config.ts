import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      AMM_LOG_LEVEL: "silent",
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/**/index.ts"],
      thresholds: {
        // Pricing and settlement paths carry the invariants
        "src/pricing.ts": {
          statements: 95,
          branches: 85,
          functions: 95,
        },
        "src/exchange.ts": {
          statements: 90,
          branches: 80,
          functions: 95,
        },
      },
    },
  },
});
