import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";
import path from "path";

export default defineConfig({
  plugins: [
    tsconfigPaths({
      projects: [path.resolve(__dirname, "tsconfig.json")],
    }),
  ],

  test: {
    environment: "node",
    globals: true,
    include: ["src/**/*.test.ts", "src/**/_test_/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    restoreMocks: true,
    // PGlite boots a wasm postgres per suite
    testTimeout: 20_000,
  },
});
