/**
 * Argument binding.
 * Maps a call's arguments onto the target's formal parameters the way the
 * interpreter would, degrading to `unknown` where the call is indeterminate.
 */

import {
  VARIADIC_KEYWORD_BUCKET,
  VARIADIC_POSITIONAL_BUCKET,
  type ApiParameter,
  type CallArgument,
  type ParameterBindings,
  type ValueSignature,
} from "./model.js";
import { DEFAULT_SIGNATURE, UNKNOWN_SIGNATURE, shape } from "./signatures.js";

export interface BindOptions {
  /** Drop the first positional argument: it fills the implicit receiver */
  explicitReceiver?: boolean;
}

const POSITIONAL_KINDS = new Set(["positional_only", "positional_or_keyword"]);
const KEYWORD_KINDS = new Set(["positional_or_keyword", "keyword_only"]);

/**
 * Bind call arguments to formal parameters.
 *
 * Every non-variadic parameter receives exactly one signature per call:
 * the argument's value, `default` when omitted but defaulted, or `unknown`.
 * Arguments caught by `*args` / `**kwargs` land in the `*` / `**` buckets.
 * Never throws.
 */
export function bindArguments(
  parameters: readonly ApiParameter[],
  args: readonly CallArgument[],
  options: BindOptions = {}
): ParameterBindings {
  const bound = new Map<string, ValueSignature>();
  const positionalSlots = parameters.filter((p) => POSITIONAL_KINDS.has(p.kind));
  const varPositional = parameters.find((p) => p.kind === "var_positional");
  const varKeyword = parameters.find((p) => p.kind === "var_keyword");

  let sawStar = false;
  let sawDoubleStar = false;
  const absorbedKeywords: string[] = [];

  // Keywords first so positional arguments skip slots already bound by name.
  for (const arg of args) {
    if (arg.kind === "double_star") {
      sawDoubleStar = true;
      continue;
    }
    if (arg.kind !== "keyword") {
      continue;
    }
    const target = parameters.find((p) => p.name === arg.name && KEYWORD_KINDS.has(p.kind));
    if (target && !bound.has(target.name)) {
      bound.set(target.name, arg.value);
    } else if (varKeyword) {
      absorbedKeywords.push(arg.name);
    }
  }

  let skipReceiver = options.explicitReceiver === true;
  let slotIndex = 0;
  let absorbedPositional = 0;

  for (const arg of args) {
    if (arg.kind === "star") {
      sawStar = true;
      continue;
    }
    if (arg.kind !== "positional" || sawStar) {
      continue;
    }
    if (skipReceiver) {
      skipReceiver = false;
      continue;
    }
    while (slotIndex < positionalSlots.length && bound.has(positionalSlots[slotIndex].name)) {
      slotIndex++;
    }
    if (slotIndex < positionalSlots.length) {
      bound.set(positionalSlots[slotIndex].name, arg.value);
      slotIndex++;
    } else if (varPositional) {
      absorbedPositional++;
    }
  }

  const result: ParameterBindings = new Map();

  for (const parameter of parameters) {
    if (parameter.kind === "var_positional" || parameter.kind === "var_keyword") {
      continue;
    }
    const value = bound.get(parameter.name);
    if (value) {
      result.set(parameter.name, value);
    } else if (
      (sawStar && POSITIONAL_KINDS.has(parameter.kind)) ||
      (sawDoubleStar && KEYWORD_KINDS.has(parameter.kind))
    ) {
      result.set(parameter.name, UNKNOWN_SIGNATURE);
    } else if (parameter.defaultValue !== null) {
      result.set(parameter.name, DEFAULT_SIGNATURE);
    } else {
      result.set(parameter.name, UNKNOWN_SIGNATURE);
    }
  }

  if (varPositional) {
    if (sawStar) {
      result.set(VARIADIC_POSITIONAL_BUCKET, UNKNOWN_SIGNATURE);
    } else if (absorbedPositional > 0) {
      result.set(VARIADIC_POSITIONAL_BUCKET, shape(`positional(${absorbedPositional})`));
    }
  }

  if (varKeyword) {
    if (sawDoubleStar) {
      result.set(VARIADIC_KEYWORD_BUCKET, UNKNOWN_SIGNATURE);
    } else if (absorbedKeywords.length > 0) {
      result.set(VARIADIC_KEYWORD_BUCKET, shape(`keywords(${[...absorbedKeywords].sort().join(",")})`));
    }
  }

  return result;
}
