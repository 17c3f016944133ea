import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/backend/src/test/**/*.test.ts"],
    testTimeout: 15_000
  }
});
