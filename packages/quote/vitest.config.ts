import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@shapemacro/quote",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
