import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.mts"],
    // automatic mock cleanup
    restoreMocks: true,
  },
});
