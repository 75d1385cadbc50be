import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const PACKAGE_DIR = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: [
      {
        find: /^@cmdspec\/core$/,
        replacement: path.resolve(PACKAGE_DIR, "../cmdspec-core/src/index.ts"),
      },
    ],
  },
});
