import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    hookTimeout: 30000, // Needed for coverage runs (instrumentation adds overhead)
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.test.*", "**/test/**"],
      reporter: ["text", "html", "lcov", "json-summary", "json"],
    },
    // Workspace packages resolve to their sources, same as the tsconfig paths
    alias: {
      "@xamlshift/mappings": fileURLToPath(new URL("./packages/mappings/src/index.ts", import.meta.url)),
      "@xamlshift/markup": fileURLToPath(new URL("./packages/markup/src/index.ts", import.meta.url)),
    },
  },
});
