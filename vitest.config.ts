import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    testTimeout: 15000,
    env: {
      NODE_ENV: "test",
    },
  },
});
