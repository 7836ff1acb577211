import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
});
