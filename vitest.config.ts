import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts", "tests/**/*.test.ts"],
    testTimeout: 10_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: [
        "src/reconcile/engine.ts",
        "src/events/notification-policy/**",
        "src/monitor/cycle.ts",
        "src/store/state-store.ts",
        "src/service/monitor-service.ts",
      ],
      exclude: ["src/**/__tests__/**"],
    },
  },
});
