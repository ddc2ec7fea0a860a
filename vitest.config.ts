import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    alias: [
      { find: /^@resource-ls\/compiler$/, replacement: source("./packages/compiler/src/index.ts") },
      { find: /^@resource-ls\/language-server(\/api)?$/, replacement: source("./packages/language-server/src/api.ts") },
    ],
  },
});
