import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // the CLI tests spawn the entry point through tsx
    testTimeout: 20_000,
  },
});
