import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const dir = (relative: string) =>
  fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@": dir("./src"),
      "~shared": dir("./deps/shared/src"),
      "~test": dir("./test"),
    },
  },
  test: {
    include: ["test/**/*.test.ts", "deps/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "test/tmp/**"],
    testTimeout: 20_000,
  },
});
