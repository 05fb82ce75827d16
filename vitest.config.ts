import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["miner/__tests__/**/*.test.ts"],
    environment: "node",
    testTimeout: 20_000,
  },
});
