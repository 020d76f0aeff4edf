import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["cdk/test/**/*.test.ts"],
    // synthesizing the stack takes a few seconds
    testTimeout: 30_000,
  },
});
