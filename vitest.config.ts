import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    watch: false,
    include: ["test/**/*.spec.ts"],
    coverage: {
      provider: "istanbul",
      reporter: ["text", "text-summary", "lcov"],
      include: ["src/**/*.ts"],
    },
  },
});
