import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["package/src/**/__tests__/**/*.test.ts"],
    reporters: ["default"],
  },
});
