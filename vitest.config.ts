import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/tests/**/*.test.ts", "tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});
