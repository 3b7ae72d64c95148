import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts", "test/**/*.properties.ts"],
    globals: false,
    testTimeout: 60_000,
  },
});
