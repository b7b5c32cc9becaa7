import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

// Workspace packages resolve to their TypeScript sources, so tests need no build.
const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@datacheck/core": source("core"),
      "@datacheck/engine": source("engine"),
      "@datacheck/cli": source("cli"),
    },
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
  },
});
