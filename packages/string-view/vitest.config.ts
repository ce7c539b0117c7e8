import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tinystd/string-view",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
