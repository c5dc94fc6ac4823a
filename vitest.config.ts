import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      MJCF_LOG_CONSOLE: "false",
    },
  },
});
