import { defineConfig } from "tsdown";

export default defineConfig({
  entry: ["./src/index.ts", "./src/bin/nullsim.ts"],
  format: "esm",
  target: "node20",
  clean: true,
  dts: true,
  sourcemap: true,
  platform: "node",
  external: ["picocolors", "table", "yargs", "yargs/helpers"],
  logLevel: "warn",
});
