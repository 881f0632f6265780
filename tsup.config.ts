import { defineConfig } from "tsup";

// The shebang lives in src/cli.ts so the plain tsc build stays runnable as a bin.
export default defineConfig({
  entry: { cli: "src/cli.ts" },
  format: ["esm"],
  platform: "node",
  target: "node20",
  outDir: "dist",
  sourcemap: true,
  clean: true
});
