import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["server/tests/**/*.test.ts", "client/tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    env: {
      LOG_SILENT: "true",
    },
    testTimeout: 30000,
  },
});
