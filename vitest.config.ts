// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Run tests in parallel by default
    pool: "threads",
    include: ["test/**/*.spec.ts"],
  },
});
