import path from "node:path";
import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "./src"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    testTimeout: 10_000,
    hookTimeout: 10_000,
    exclude: [...configDefaults.exclude],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
});
