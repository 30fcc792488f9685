import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["cjs"],
  target: "node20",
  platform: "node",
  outDir: "dist",
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,

  // Bundle all workspace packages into the output
  noExternal: [/^@pocketsolve\//],

  banner: {
    js: "#!/usr/bin/env node",
  },
});
