import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: [
      "packages/*/src/**/__tests__/**/*.test.ts",
      "apps/*/src/**/__tests__/**/*.test.ts",
    ],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["packages/device-control/src/**", "apps/backend/src/**"],
      exclude: ["**/__tests__/**"],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 60,
      },
    },
    setupFiles: ["./packages/device-control/src/__tests__/setup.ts"],
  },
});
