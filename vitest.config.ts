import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@shared": fileURLToPath(new URL("./shared", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    globals: true,
    include: [
      "server/**/*.test.ts"
    ],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
});
