import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    globals: false,
    env: {
      LOG_LEVEL: "error",
      NODE_ENV: "test",
    },
  },
});
