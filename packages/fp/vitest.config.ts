import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tessera/fp",
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
