import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const here = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@switchboard\/errors$/, replacement: resolve(here, "packages/errors/src/index.ts") },
      { find: /^@switchboard\/core$/, replacement: resolve(here, "packages/core/src/index.ts") },
    ],
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
  },
});
