import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    // Every e2e case spawns the CLI under tsx
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
