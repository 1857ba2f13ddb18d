import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["temporal-markers/test/**/*.test.ts"],
    environment: "node",
  },
});
