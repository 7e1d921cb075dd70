/// <reference types="vitest" />
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: ["tests/**", "**/*.d.ts", "node_modules/**", "dist/**"],
    },
    include: ["src/**/*.{test,spec}.ts", "tests/**/*.{test,spec}.ts"],
    isolate: true,
    pool: "forks",
    // Archive fixtures are written to disk; keep per-test headroom on slow CI disks
    hookTimeout: 30000,
    testTimeout: 30000,
  },
});
