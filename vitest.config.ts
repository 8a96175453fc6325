import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
    // Local calendar dates in tests are computed in UTC
    env: { TZ: "UTC" },
  },
});
