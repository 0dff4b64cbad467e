import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Workspace packages resolve to their sources, as the "source" export condition does for tsc.
const source = (pkg: string) => fileURLToPath(new URL(`./languages/typescript/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@picocbor/runtime": source("runtime"),
      "@picocbor/codegen": source("codegen"),
    },
  },
  test: {
    environment: "node",
    include: ["languages/typescript/*/test/**/*.test.ts"],
  },
});
