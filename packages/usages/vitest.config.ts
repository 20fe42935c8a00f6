import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "usages",
    include: ["test/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
    environment: "node",
    testTimeout: 20000,
    globals: true,
  },
});
