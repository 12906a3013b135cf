import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@shapemacro/transformer",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
