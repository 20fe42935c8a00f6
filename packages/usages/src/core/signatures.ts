import type { ValueSignature } from "./model.js";

export const DEFAULT_SIGNATURE: ValueSignature = { kind: "default" };
export const UNKNOWN_SIGNATURE: ValueSignature = { kind: "unknown" };

export const literal = (value: string): ValueSignature => ({ kind: "literal", value });
export const shape = (name: string): ValueSignature => ({ kind: "shape", shape: name });

/**
 * Histogram key for a signature: `literal:<text>`, `shape:<name>`, `default` or `unknown`.
 */
export function signatureKey(signature: ValueSignature): string {
  switch (signature.kind) {
    case "literal":
      return `literal:${signature.value}`;
    case "shape":
      return `shape:${signature.shape}`;
    case "default":
      return "default";
    case "unknown":
      return "unknown";
  }
}

/**
 * Inverse of signatureKey. Unrecognised keys read as unknown.
 */
export function parseSignatureKey(key: string): ValueSignature {
  if (key.startsWith("literal:")) {
    return literal(key.slice("literal:".length));
  }
  if (key.startsWith("shape:")) {
    return shape(key.slice("shape:".length));
  }
  if (key === "default") {
    return DEFAULT_SIGNATURE;
  }
  return UNKNOWN_SIGNATURE;
}

/**
 * Human-readable form used in reports.
 */
export function describeSignature(signature: ValueSignature): string {
  switch (signature.kind) {
    case "literal":
      return signature.value;
    case "shape":
      return `<${signature.shape}>`;
    case "default":
      return "<default>";
    case "unknown":
      return "<unknown>";
  }
}
