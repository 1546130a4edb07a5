import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      // the package's runtime entry is the tsup build; tests run on sources
      "html-fragments": fileURLToPath(
        new URL("./packages/html-fragments/src/index.ts", import.meta.url)
      )
    }
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node"
  }
});
