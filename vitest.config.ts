import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "dispatch/**/*.test.ts", "config/**/*.test.ts"],
  },
});
