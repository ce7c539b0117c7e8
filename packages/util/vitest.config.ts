import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tinystd/util",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
