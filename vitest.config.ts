import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      CHARTWRIGHT_DB_PATH: ":memory:",
    },
  },
});
