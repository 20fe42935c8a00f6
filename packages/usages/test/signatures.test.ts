import { describe, it, expect } from "vitest";

import {
  DEFAULT_SIGNATURE,
  UNKNOWN_SIGNATURE,
  describeSignature,
  literal,
  parseSignatureKey,
  shape,
  signatureKey,
} from "../src/core/signatures.js";

describe("signature keys", () => {
  it("encodes each kind with its own prefix", () => {
    expect(signatureKey(literal("'rbf'"))).toBe("literal:'rbf'");
    expect(signatureKey(shape("list"))).toBe("shape:list");
    expect(signatureKey(DEFAULT_SIGNATURE)).toBe("default");
    expect(signatureKey(UNKNOWN_SIGNATURE)).toBe("unknown");
  });

  it("keeps colons inside literal values", () => {
    expect(parseSignatureKey("literal:'a:b'")).toEqual(literal("'a:b'"));
  });

  it("reads unrecognised keys as unknown", () => {
    expect(parseSignatureKey("weird")).toEqual(UNKNOWN_SIGNATURE);
  });

  it("describes signatures for reports", () => {
    expect(describeSignature(literal("42"))).toBe("42");
    expect(describeSignature(shape("dict"))).toBe("<dict>");
    expect(describeSignature(DEFAULT_SIGNATURE)).toBe("<default>");
    expect(describeSignature(UNKNOWN_SIGNATURE)).toBe("<unknown>");
  });
});
