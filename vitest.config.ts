import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/*/src/**/*.test.ts"],
    exclude: ["node_modules/**", "**/dist/**"],
  },
});
