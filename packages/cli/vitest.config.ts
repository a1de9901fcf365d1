import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@hitch/cli",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
