import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: [
      "src/**/*.test.ts",
      "tests/**/*.test.ts",
    ],
    exclude: [
      "node_modules",
      "dist",
    ],
    setupFiles: ["./tests/setup.ts"],
    testTimeout: 10_000,
    pool: "forks",
  },
});
