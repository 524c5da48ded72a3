import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // Logger tests spy on console
    restoreMocks: true,
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
