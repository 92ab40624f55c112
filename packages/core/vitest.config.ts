import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@sexpr/core",
    globals: true,
    environment: "node",
  },
});
