import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["baselinectl/test/**/*.test.ts"],
  },
});
