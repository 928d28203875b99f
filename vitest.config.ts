import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["__tests__/**/*.test.ts"],
    // process.umask() is not available inside worker threads
    pool: "forks",
    testTimeout: 10000,
  },
});
