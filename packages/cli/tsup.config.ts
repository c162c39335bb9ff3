import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "tsup";

const packageDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  entry: [path.join(packageDir, "src/index.ts"), path.join(packageDir, "src/wafctl.ts")],
  format: ["esm"],
  platform: "node",
  target: "node20",
  splitting: false,
  sourcemap: true,
  clean: true,
  dts: false,
  noExternal: ["@wafctl/core", "@wafctl/sucuri-client"],
  external: ["yaml", "commander", "@clack/prompts", "ipaddr.js", "p-limit"],
  outDir: path.join(packageDir, "dist")
});
