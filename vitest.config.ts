import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cli/**/*.test.ts"],
    environment: "node",
    testTimeout: 20_000,
  },
});
