import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const core = (path: string) =>
  fileURLToPath(new URL(`./packages/core/src/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages resolve to dist/ at run time; tests load the sources
    alias: {
      "@openapi-deref/core/openapi": core("openapi/index.ts"),
      "@openapi-deref/core/json-pointer": core("json-pointer/index.ts"),
      "@openapi-deref/core/result": core("result/result.ts"),
      "@openapi-deref/core/configuration": core("configuration/DerefConfiguration.ts"),
      "@openapi-deref/core/logging": core("logging/index.ts"),
    },
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
  },
});
