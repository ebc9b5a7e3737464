import { defineConfig } from "vitest/config";

export default defineConfig({
  // Tests must not pick up a developer's .env (API keys, output dirs).
  envDir: ".vitest-env",
  test: {
    pool: "threads",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "dist/**"],
    env: {
      LOG_LEVEL: "silent"
    }
  },
});
