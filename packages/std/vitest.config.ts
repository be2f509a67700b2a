import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tessera/std",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
