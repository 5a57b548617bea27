import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["_lib/tests/**/*.test.ts"],
    environment: "node",
  },
});
