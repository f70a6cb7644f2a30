import { defineConfig } from "vitest/config"
import { fileURLToPath } from "node:url"
import { dirname, resolve } from "node:path"

const ROOT_DIR = dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@taskwire\/core$/,
        replacement: resolve(ROOT_DIR, "packages/core/src/index.ts"),
      },
      {
        find: /^@taskwire\/test-utils$/,
        replacement: resolve(ROOT_DIR, "packages/test-utils/src/index.ts"),
      },
      {
        find: /^@taskwire\/types$/,
        replacement: resolve(ROOT_DIR, "packages/types/src/index.ts"),
      },
      {
        find: /^@taskwire\/sdk$/,
        replacement: resolve(ROOT_DIR, "apps/sdk/src/index.ts"),
      },
    ],
  },
  test: {
    include: [
      "test/**/*.test.ts",
      "packages/*/src/**/*.test.ts",
      "apps/*/src/**/*.test.ts"
    ],
    setupFiles: ["./vitest.setup.ts"],
    environment: "node",
    testTimeout: 10000,
    teardownTimeout: 10000,
    hookTimeout: 10000,
    pool: "forks",
    isolate: true,
    sequence: {
      concurrent: false
    }
  }
})
