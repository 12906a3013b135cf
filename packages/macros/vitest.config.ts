import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@shapemacro/macros",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
