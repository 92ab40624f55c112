import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@sexpr/lisp",
    globals: true,
    environment: "node",
  },
});
