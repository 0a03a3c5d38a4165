import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      TALKGUARD_LOG_LEVEL: "silent"
    }
  }
});
