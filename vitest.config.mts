import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["backend/tests/**/*.spec.ts"],
    environment: "node",
  },
});
