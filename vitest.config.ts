import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

// Centralized test config for root tests/*.test.ts.
export default defineConfig({
  resolve: {
    alias: {
      "@wafctl/core": path.join(rootDir, "packages/core/src/index.ts"),
      "@wafctl/sucuri-client": path.join(rootDir, "packages/sucuri-client/src/index.ts"),
      "wafctl": path.join(rootDir, "packages/cli/src/index.ts")
    }
  },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node"
  }
});
