import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";

import config from "../tsup.config.js";

function readJson(relative: string): unknown {
  return JSON.parse(readFileSync(new URL(relative, import.meta.url), "utf-8"));
}

describe("server bundle", () => {
  it("bundles the server with the workspace core inlined", () => {
    if (typeof config === "function" || Array.isArray(config)) {
      throw new Error("Expected a single tsup options object");
    }
    expect(config.entry).toEqual(["src/server.ts"]);
    expect(config.noExternal).toContain("@usagelens/core");
    expect(config.external).toEqual(["tree-sitter", "tree-sitter-python"]);
  });

  it("points both bin entries at the bundled server", () => {
    expect(readJson("../package.json")).toMatchObject({ bin: { "usagelens-usages": "./dist/server.js" } });
    expect(readJson("../../../package.json")).toMatchObject({
      bin: { "usagelens-usages": "packages/usages/dist/server.js" },
    });
  });
});
