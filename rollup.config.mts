// rollup.config.mts
//
// Rollup configuration for the jsondescent library.
//
// - Build an ESM bundle and a CJS bundle from src/index.ts
// - Keep Node built-ins and declared dependencies external
// - Transpile with @rollup/plugin-typescript; `tsc -p tsconfig.build.json`
//   writes the .d.ts files into dist/

import { defineConfig } from "rollup";
import typescript from "@rollup/plugin-typescript";
import { nodeResolve } from "@rollup/plugin-node-resolve";
import { builtinModules } from "node:module";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

interface PackageManifest {
  main?: string;
  module?: string;
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
}

const pkg: PackageManifest = JSON.parse(
  readFileSync(resolve(__dirname, "package.json"), "utf8"),
);

const external = [
  ...builtinModules,
  ...builtinModules.map((m) => `node:${m}`),
  ...Object.keys(pkg.dependencies ?? {}),
  ...Object.keys(pkg.peerDependencies ?? {}),
];

export default defineConfig({
  input: resolve(__dirname, "src/index.ts"),

  external,

  output: [
    {
      file: pkg.module ?? "dist/index.mjs",
      format: "esm",
      sourcemap: true,
      exports: "named",
    },
    {
      file: pkg.main ?? "dist/index.cjs",
      format: "cjs",
      sourcemap: true,
      exports: "named",
    },
  ],

  plugins: [
    nodeResolve({
      extensions: [".mjs", ".js", ".ts"],
      preferBuiltins: true,
    }),

    // Declarations come from tsconfig.build.json.
    typescript({
      tsconfig: "./tsconfig.bundle.json",
      declaration: false,
      include: ["src/**/*.ts"],
    }),
  ],

  treeshake: {
    moduleSideEffects: false,
    propertyReadSideEffects: false,
  },

  preserveEntrySignatures: "exports-only",
});
