import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@hitch/expander",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
