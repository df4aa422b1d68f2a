import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Workspace packages publish built output; tests run against their sources
const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@devports/core": source("./packages/core/src/index.ts"),
      "@devports/shared": source("./packages/shared/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    exclude: ["node_modules", "**/dist"],
  },
});
