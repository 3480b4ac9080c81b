import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "supervisor",
    include: ["test/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
    environment: "node",
    testTimeout: 30000, // Real worker processes in the launcher tests
    globals: true,
  },
});
