import { defineConfig } from "vitest/config";
import path from "node:path";

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(__dirname),
    },
  },
  test: {
    environment: "node",
    include: ["tests-ts/**/*.test.ts", "tools/research-radar-cli/test/**/*.test.ts"],
    globals: true,
  },
});
