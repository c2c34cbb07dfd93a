// rollup.config.mts
//
// Rollup configuration for the Predicast library.
//
// - ESM and CJS bundles from src/index.ts
// - Declarations come from `tsc -p tsconfig.build.json`, not from Rollup

import { defineConfig } from "rollup";
import typescript from "@rollup/plugin-typescript";
import commonjs from "@rollup/plugin-commonjs";
import { nodeResolve } from "@rollup/plugin-node-resolve";
import json from "@rollup/plugin-json";
import { builtinModules } from "node:module";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

const __dirname = dirname(fileURLToPath(import.meta.url));

interface PackageManifest {
  main?: string;
  module?: string;
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
}

const pkg: PackageManifest = JSON.parse(
  readFileSync(resolve(__dirname, "package.json"), "utf8"),
);

// Node built-ins and declared deps stay external.
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
      extensions: [".mjs", ".js", ".json", ".ts"],
      preferBuiltins: true,
    }),
    commonjs(),
    json(),
    typescript({
      tsconfig: "./tsconfig.build.json",
      declaration: false,
      emitDeclarationOnly: false,
      noEmit: false,
      outDir: "dist",
    }),
  ],

  treeshake: {
    moduleSideEffects: false,
    propertyReadSideEffects: false,
    tryCatchDeoptimization: false,
  },

  preserveEntrySignatures: "exports-only",
});
