import { describe, it, expect } from "vitest";

import { ApiIndex, bareName, parentOf } from "../src/core/services/ApiIndex.js";
import { SAMPLE_API } from "./helpers.js";

describe("ApiIndex", () => {
  const api = new ApiIndex(SAMPLE_API);

  it("looks elements up by qualified name", () => {
    expect(api.get("pkg.fn")?.kind).toBe("function");
    expect(api.get("pkg.nope")).toBeUndefined();
  });

  it("separates callables from classes", () => {
    expect(api.classes().map((c) => c.qname)).toEqual(["pkg.models.Model", "pkg.models.Empty"]);
    expect(api.callables()).toHaveLength(10);
  });

  it("canonicalises re-exported paths by longest prefix", () => {
    expect(api.canonicalize("pkg.Model")).toBe("pkg.models.Model");
    expect(api.canonicalize("pkg.Model.fit")).toBe("pkg.models.Model.fit");
    expect(api.canonicalize("pkg.load")).toBe("pkg.io.read");
    expect(api.canonicalize("pkg.fn")).toBe("pkg.fn");
  });

  it("stops on alias cycles", () => {
    const cyclic = new ApiIndex({ package: "c", elements: [], aliases: { "c.a": "c.b", "c.b": "c.a" } });
    expect(["c.a", "c.b"]).toContain(cyclic.canonicalize("c.a"));
  });

  it("finds constructors", () => {
    expect(api.constructorOf("pkg.models.Model")?.qname).toBe("pkg.models.Model.__init__");
    expect(api.constructorOf("pkg.models.Empty")).toBeUndefined();
  });

  it("lists what a wildcard import binds", () => {
    expect(api.exportsOf("pkg.io")).toEqual([
      { name: "read", path: "pkg.io.read" },
      { name: "write", path: "pkg.io.write" },
    ]);
    expect(api.exportsOf("pkg")).toEqual([
      { name: "fn", path: "pkg.fn" },
      { name: "Model", path: "pkg.Model" },
      { name: "load", path: "pkg.load" },
    ]);
  });

  it("finds functions and classes by bare name", () => {
    expect(api.findByBareName("read").map((e) => e.qname)).toEqual(["pkg.io.read", "pkg.utils.helpers.read"]);
    expect(api.findByBareName("fit")).toEqual([]);
  });

  it("knows which paths belong to the package", () => {
    expect(api.belongsToPackage("pkg.io")).toBe(true);
    expect(api.belongsToPackage("pkgx.io")).toBe(false);
    expect(api.packageRoots()).toEqual(["pkg"]);
  });

  it("splits qualified names", () => {
    expect(bareName("pkg.io.read")).toBe("read");
    expect(parentOf("pkg.io.read")).toBe("pkg.io");
    expect(parentOf("pkg")).toBe("");
  });
});
