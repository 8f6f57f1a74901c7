import { defineConfig } from "vitest/config";

const isCI = process.env.CI === "1" || process.env.CI === "true";
const requestedPool = process.env.VITEST_POOL;
const pool = requestedPool === "forks" || requestedPool === "threads" ? requestedPool : isCI ? "forks" : "threads";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts", "ingestion/tests/**/*.test.ts", "language_model/tests/**/*.test.ts"],
    pool,
    poolOptions: {
      threads: {
        singleThread: isCI,
        minThreads: 1,
        maxThreads: isCI ? 2 : undefined,
      },
      forks: {
        singleFork: true,
      },
    },
    watch: false,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: isCI ? 30000 : 10000,
    slowTestThreshold: isCI ? 2000 : 1000,
  },
});
