import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // keep engine logging quiet regardless of the developer's .env
    env: { LOG_LEVEL: "silent" },
  },
});
