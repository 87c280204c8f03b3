import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@revgrad/core": src("core"),
      "@revgrad/autograd": src("autograd"),
      "@revgrad/scalar": src("scalar"),
      "@revgrad/runtime": src("runtime"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
  },
});
