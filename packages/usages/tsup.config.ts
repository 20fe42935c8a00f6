import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/server.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  sourcemap: true,
  // Workspace sources ship as TypeScript, so they go into the bundle
  noExternal: ["@usagelens/core"],
  external: ["tree-sitter", "tree-sitter-python"],
});
