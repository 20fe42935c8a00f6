import { describe, it, expect, afterEach } from "vitest";
import { rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { ConfigError } from "../src/core/errors.js";
import { loadApiDescription, parseApiDescription } from "../src/infrastructure/api/ApiDescriptionLoader.js";

describe("parseApiDescription", () => {
  it("reads the native layout and fills defaults", () => {
    const result = parseApiDescription({
      package: "pkg",
      elements: [
        { qname: "pkg.fn", kind: "function", parameters: [{ name: "a" }, { name: "b", default: "1" }] },
        { qname: "pkg.C.m", kind: "method" },
        { qname: "pkg.C.s", kind: "method", receiver: "none", parameters: [{ name: "rest", kind: "var_positional" }] },
      ],
    });

    expect(result).toEqual({
      ok: true,
      value: {
        package: "pkg",
        version: undefined,
        aliases: {},
        elements: [
          {
            qname: "pkg.fn",
            kind: "function",
            receiver: undefined,
            parameters: [
              { name: "a", kind: "positional_or_keyword", defaultValue: null },
              { name: "b", kind: "positional_or_keyword", defaultValue: "1" },
            ],
          },
          { qname: "pkg.C.m", kind: "method", receiver: "instance", parameters: [] },
          {
            qname: "pkg.C.s",
            kind: "method",
            receiver: "none",
            parameters: [{ name: "rest", kind: "var_positional", defaultValue: null }],
          },
        ],
      },
    });
  });

  it("converts the legacy layout", () => {
    const result = parseApiDescription({
      distribution: "pkg-dist",
      package: "pkg",
      version: "0.9",
      classes: ["pkg.Model"],
      functions: [
        { qname: "pkg.train", parameters: [{ name: "data", default_value: null }] },
        {
          qname: "pkg.Model.fit",
          parameters: [
            { name: "self", default_value: null },
            { name: "epochs", default_value: "10" },
          ],
        },
        { qname: "pkg.Model.create", parameters: [{ name: "cls", default_value: null }] },
        { qname: "pkg.Model.helper", parameters: [{ name: "x", default_value: null }] },
      ],
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.version).toBe("0.9");
    expect(result.value.elements).toEqual([
      { qname: "pkg.Model", kind: "class", parameters: [] },
      {
        qname: "pkg.train",
        kind: "function",
        parameters: [{ name: "data", kind: "positional_or_keyword", defaultValue: null }],
      },
      {
        qname: "pkg.Model.fit",
        kind: "method",
        receiver: "instance",
        parameters: [{ name: "epochs", kind: "positional_or_keyword", defaultValue: "10" }],
      },
      { qname: "pkg.Model.create", kind: "method", receiver: "class", parameters: [] },
      {
        qname: "pkg.Model.helper",
        kind: "method",
        receiver: "none",
        parameters: [{ name: "x", kind: "positional_or_keyword", defaultValue: null }],
      },
    ]);
  });

  it("rejects documents of neither layout", () => {
    const result = parseApiDescription({ package: "pkg", elements: [{ qname: "pkg.x", kind: "widget" }] });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.message).toMatch(/^Invalid API description/);
    }
  });
});

describe("loadApiDescription", () => {
  const file = join(tmpdir(), `api-test-${Date.now()}.json`);

  afterEach(() => {
    rmSync(file, { force: true });
  });

  it("loads a description from disk", async () => {
    writeFileSync(file, JSON.stringify({ package: "pkg", version: "2", elements: [], aliases: { "pkg.A": "pkg.a.A" } }));
    expect(await loadApiDescription(file)).toEqual({
      ok: true,
      value: { package: "pkg", version: "2", elements: [], aliases: { "pkg.A": "pkg.a.A" } },
    });
  });

  it("reports malformed JSON as a ConfigError", async () => {
    writeFileSync(file, "{ not json");
    const result = await loadApiDescription(file);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConfigError);
    }
  });
});
