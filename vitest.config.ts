import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: {
      "@bitcodec/bits/memory": fileURLToPath(
        new URL("./packages/bits/src/memory/index.ts", import.meta.url),
      ),
      "@bitcodec/bits": fileURLToPath(new URL("./packages/bits/src/index.ts", import.meta.url)),
    },
  },
});
