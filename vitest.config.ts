import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["schema/compiler/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 10000,
  },
});
