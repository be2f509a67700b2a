import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tessera/core",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
