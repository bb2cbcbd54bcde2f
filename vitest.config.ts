import { defineConfig } from "vitest/config";

// Schedules are computed in local time; pin it so results match in CI.
process.env.TZ ??= "UTC";

export default defineConfig({
  test: {
    include: [
      "backend/src/**/__tests__/**/*.test.ts",
      "frontend/src/**/__tests__/**/*.test.{ts,tsx}",
    ],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      LOG_LEVEL: "silent",
    },
    testTimeout: 15_000,
  },
});
