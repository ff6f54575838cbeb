import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // Sink tests change the working directory, which worker threads cannot do.
    pool: "forks"
  }
});
