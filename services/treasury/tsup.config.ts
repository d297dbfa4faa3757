import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/cli/runner.ts"],
  format: ["esm"],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  treeshake: true,
  external: ["@ballast/shared"],
});
