import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["app/src/tests/**/*.test.ts"]
  }
});
