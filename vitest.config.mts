// vitest.config.mts
//
// Vitest configuration for Predicast.
// - Node environment only; the library touches no DOM
// - Coverage through V8
// - Path aliases via tsconfig (and a direct @ → src alias)

import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  plugins: [tsconfigPaths()],

  resolve: {
    alias: {
      "@": resolve(__dirname, "src"),
    },
  },

  test: {
    globals: true,
    environment: "node",

    include: ["tests/**/*.spec.ts"],
    exclude: ["node_modules", "dist", "coverage"],

    coverage: {
      provider: "v8",
      reportsDirectory: "coverage",
      reporter: ["text", "html", "lcov"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/index.ts", "src/core/types.ts"],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },

    clearMocks: true,
    restoreMocks: true,
  },
});
