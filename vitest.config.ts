import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@keel/types": pkg("types"),
      "@keel/ledger": pkg("ledger"),
      "@keel/vault": pkg("vault"),
      "@keel/lending": pkg("lending"),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json"],
      include: ["packages/*/src/**/*.ts"],
      exclude: ["packages/*/src/index.ts", "packages/node/src/main.ts"],
    },
  },
});
