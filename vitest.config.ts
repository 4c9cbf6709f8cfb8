import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["bot/tests/**/*.test.ts"],
    environment: "node",
  },
});
