import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const resolveSrc = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: [
      "packages/*/src/**/*.test.ts",
      "apps/*/src/**/*.test.ts",
      "tests/**/*.test.ts",
    ],
  },
  resolve: {
    alias: {
      "@collab/types": resolveSrc("types"),
      "@collab/core": resolveSrc("core"),
      "@collab/persistence": resolveSrc("persistence"),
    },
  },
});
