// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Matching is synchronous and in-process; keep the default timeout short
    testTimeout: 10_000,
    pool: "threads",
    include: ["test/**/*.spec.ts"],
  },
});
