import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["latencyctl/test/**/*.test.ts"],
    environment: "node",
  },
});
