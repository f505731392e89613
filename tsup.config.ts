import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/server.ts", "src/cli.ts"],
  format: ["esm"], // Both entries run as Node ESM binaries
  target: "node20",
  dts: false,
  sourcemap: true,
  clean: true,
});
