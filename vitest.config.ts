import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // better-sqlite3 is a native add-on; separate processes keep each file's handles isolated
    pool: "forks",
    testTimeout: 15_000,
  },
});
