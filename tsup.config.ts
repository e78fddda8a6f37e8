import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/client/index.ts"],
  format: ["esm"],
  sourcemap: true,
  clean: true,
  target: "node20",
  splitting: false,
  shims: false,
});
