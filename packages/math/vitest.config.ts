import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tessera/math",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
