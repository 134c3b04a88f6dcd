import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    include: ["apps/*/tests/**/*.test.ts", "packages/*/tests/**/*.test.ts"],
    environment: "node",
    // native image work (sharp, skia) is slow on cold CI runners
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "apps/api/src"),
    },
  },
});
