import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/src/**/__tests__/**/*.test.ts"],
    exclude: ["node_modules", "dist", "**/*.d.ts"],
    reporters: "default",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent"
    }
  }
});
