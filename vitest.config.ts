import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const ROOT = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts"],
    testTimeout: 15000,
    server: {
      deps: {
        // clipanion 3.x ships an ESM build with a directory import Node cannot load
        inline: ["clipanion"],
      },
    },
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: [
      {
        find: /^@cmdspec\/core$/,
        replacement: path.resolve(ROOT, "packages/cmdspec-core/src/index.ts"),
      },
      {
        find: /^@cmdspec\/emit$/,
        replacement: path.resolve(ROOT, "packages/cmdspec-emit/src/index.ts"),
      },
    ],
  },
});
