import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    alias: {
      "@graphpack/shared": pkg("shared"),
      "@graphpack/tasks": pkg("tasks"),
      "@graphpack/core": pkg("core"),
      "@graphpack/modules": pkg("modules"),
      "@graphpack/bundler": pkg("bundler"),
    },
  },
});
