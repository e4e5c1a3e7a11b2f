import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    hookTimeout: 30000,
    alias: {
      "@inlay/shared": source("shared"),
      "@inlay/tool-client": source("tool-client"),
      "@inlay/compiler": source("compiler"),
    },
  },
});
