import type { Options } from "tsup";

export const tsup: Options = {
  splitting: true,
  sourcemap: true,
  clean: true,
  dts: true,
  format: ["cjs", "esm"],
  minify: false,
  bundle: true,
  skipNodeModulesBundle: true,
  entry: {
    "index": "src/index.ts",
    "structured/index": "src/structured/index.ts",
  },
  watch: false,
  target: "node20",
  treeshake: true,
};
