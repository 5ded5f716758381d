import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    environment: "node",
    // CLI assertions compare plain text
    env: { NO_COLOR: "1" },
  },
});
