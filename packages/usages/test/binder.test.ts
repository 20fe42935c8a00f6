import { describe, it, expect } from "vitest";

import { bindArguments } from "../src/core/binder.js";
import type { ApiParameter, CallArgument, ValueSignature } from "../src/core/model.js";
import { DEFAULT_SIGNATURE, UNKNOWN_SIGNATURE, literal, shape } from "../src/core/signatures.js";

const fnParams: ApiParameter[] = [
  { name: "a", kind: "positional_or_keyword", defaultValue: null },
  { name: "x", kind: "positional_or_keyword", defaultValue: "None" },
  { name: "y", kind: "positional_or_keyword", defaultValue: "5" },
];

const pos = (value: ValueSignature): CallArgument => ({ kind: "positional", value });
const kw = (name: string, value: ValueSignature): CallArgument => ({ kind: "keyword", name, value });

function bound(parameters: ApiParameter[], args: CallArgument[], explicitReceiver = false) {
  return Object.fromEntries(bindArguments(parameters, args, { explicitReceiver }));
}

describe("bindArguments", () => {
  it("binds positional then keyword and marks omitted defaults", () => {
    expect(bound(fnParams, [pos(literal("1")), kw("x", literal("2"))])).toEqual({
      a: literal("1"),
      x: literal("2"),
      y: DEFAULT_SIGNATURE,
    });
  });

  it("lets positionals skip parameters already bound by name", () => {
    expect(bound(fnParams, [kw("a", literal("1")), pos(literal("7"))])).toEqual({
      a: literal("1"),
      x: literal("7"),
      y: DEFAULT_SIGNATURE,
    });
  });

  it("records a missing required argument as unknown", () => {
    expect(bound(fnParams, [kw("y", literal("0"))])).toEqual({
      a: UNKNOWN_SIGNATURE,
      x: DEFAULT_SIGNATURE,
      y: literal("0"),
    });
  });

  it("drops the explicit receiver", () => {
    expect(bound(fnParams, [pos(UNKNOWN_SIGNATURE), pos(literal("1"))], true)).toEqual({
      a: literal("1"),
      x: DEFAULT_SIGNATURE,
      y: DEFAULT_SIGNATURE,
    });
  });

  it("ignores extra arguments when there is no catch-all", () => {
    const result = bound(fnParams, [pos(literal("1")), pos(literal("2")), pos(literal("3")), pos(literal("4"))]);
    expect(result).toEqual({ a: literal("1"), x: literal("2"), y: literal("3") });
  });

  describe("variadic buckets", () => {
    const plotParams: ApiParameter[] = [
      { name: "first", kind: "positional_only", defaultValue: null },
      { name: "rest", kind: "var_positional", defaultValue: null },
      { name: "color", kind: "keyword_only", defaultValue: "'k'" },
      { name: "options", kind: "var_keyword", defaultValue: null },
    ];

    it("counts absorbed positionals and names absorbed keywords", () => {
      const result = bound(plotParams, [
        pos(literal("1")),
        pos(literal("2")),
        pos(literal("3")),
        kw("width", literal("2")),
        kw("alpha", literal("0.5")),
      ]);
      expect(result).toEqual({
        first: literal("1"),
        color: DEFAULT_SIGNATURE,
        "*": shape("positional(2)"),
        "**": shape("keywords(alpha,width)"),
      });
    });

    it("omits a bucket that received nothing", () => {
      expect(bound(plotParams, [pos(literal("1"))])).toEqual({ first: literal("1"), color: DEFAULT_SIGNATURE });
    });

    it("does not bind a keyword to a positional-only parameter", () => {
      const result = bound(plotParams, [kw("first", literal("1"))]);
      expect(result).toEqual({
        first: UNKNOWN_SIGNATURE,
        color: DEFAULT_SIGNATURE,
        "**": shape("keywords(first)"),
      });
    });
  });

  describe("unpacked arguments", () => {
    it("makes unbound positional parameters unknown after *args", () => {
      const result = bound(fnParams, [pos(literal("1")), { kind: "star" }, kw("y", literal("0"))]);
      expect(result).toEqual({ a: literal("1"), x: UNKNOWN_SIGNATURE, y: literal("0") });
    });

    it("makes unbound keyword-capable parameters unknown after **kwargs", () => {
      const keywordOnly: ApiParameter[] = [
        ...fnParams,
        { name: "flag", kind: "keyword_only", defaultValue: "False" },
      ];
      const result = bound(keywordOnly, [pos(literal("1")), { kind: "double_star" }]);
      expect(result).toEqual({
        a: literal("1"),
        x: UNKNOWN_SIGNATURE,
        y: UNKNOWN_SIGNATURE,
        flag: UNKNOWN_SIGNATURE,
      });
    });

    it("marks catch-all buckets unknown when fed by unpacking", () => {
      const params: ApiParameter[] = [
        { name: "args", kind: "var_positional", defaultValue: null },
        { name: "kwargs", kind: "var_keyword", defaultValue: null },
      ];
      expect(bound(params, [{ kind: "star" }, { kind: "double_star" }])).toEqual({
        "*": UNKNOWN_SIGNATURE,
        "**": UNKNOWN_SIGNATURE,
      });
    });
  });

  it("never binds a parameter twice", () => {
    const result = bindArguments(fnParams, [pos(literal("1")), kw("a", literal("2"))]);
    expect(result.get("a")).toEqual(literal("2"));
    expect(result.get("x")).toEqual(literal("1"));
    expect(result.size).toBe(3);
  });
});
