import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@sexpr/parser",
    globals: true,
    environment: "node",
  },
});
