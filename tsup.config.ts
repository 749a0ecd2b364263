import { defineConfig } from "tsup";

export default defineConfig([
  // Library
  {
    entry: ["src/index.ts"],
    format: ["esm"],
    dts: true,
    splitting: false,
    sourcemap: true,
    clean: true,
    outDir: "dist",
    target: "node20",
  },
  // CLI
  {
    entry: ["src/cli/index.ts"],
    format: ["esm"],
    dts: false,
    splitting: false,
    sourcemap: true,
    clean: false,
    outDir: "dist/cli",
    target: "node20",
    banner: {
      js: "#!/usr/bin/env node",
    },
  },
]);
