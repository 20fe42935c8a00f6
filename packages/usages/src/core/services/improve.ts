/**
 * Minimum-usage filter over a final usage report.
 * Counts strictly below the threshold are flagged; a count equal to it is kept.
 */

import { histogramTotal } from "../aggregate.js";
import { normalizeLiteralText } from "../literals.js";
import { type ApiElement, type Histogram, type UsageReport, VARIADIC_KEYWORD_BUCKET, VARIADIC_POSITIONAL_BUCKET } from "../model.js";
import { DEFAULT_SIGNATURE, describeSignature, literal, parseSignatureKey, signatureKey } from "../signatures.js";
import type { ApiIndex } from "./ApiIndex.js";

export interface ElementUsage {
  qname: string;
  calls: number;
}

export interface RareValue {
  qname: string;
  parameter: string;
  value: string;
  count: number;
}

export interface FixableParameter {
  qname: string;
  parameter: string;
  suggestedValue: string;
  /** Calls that passed something other than the suggested value */
  customisations: number;
}

export interface ImprovementReport {
  minUsages: number;
  unusedElements: ElementUsage[];
  unusedClasses: ElementUsage[];
  rareValues: RareValue[];
  fixableParameters: FixableParameter[];
  /** Report entries with no counterpart in the API description */
  internalUsages: string[];
}

export function suggestImprovements(report: UsageReport, api: ApiIndex, minUsages: number): ImprovementReport {
  const callsOf = (qname: string): number => (Object.hasOwn(report.calls, qname) ? report.calls[qname] : 0);
  const byName = (a: { qname: string }, b: { qname: string }) => compare(a.qname, b.qname);

  const callables = api.callables().sort(byName);

  const unusedElements = callables
    .map((e) => ({ qname: e.qname, calls: callsOf(e.qname) }))
    .filter((e) => e.calls < minUsages);

  const unusedClasses = api
    .classes()
    .sort(byName)
    .map((cls) => ({
      qname: cls.qname,
      calls: callables
        .filter((e) => e.qname.startsWith(`${cls.qname}.`))
        .reduce((sum, e) => sum + callsOf(e.qname), 0),
    }))
    .filter((c) => c.calls < minUsages);

  const rareValues: RareValue[] = [];
  const fixableParameters: FixableParameter[] = [];

  for (const element of callables) {
    const parameters = Object.hasOwn(report.parameters, element.qname) ? report.parameters[element.qname] : {};

    for (const parameter of Object.keys(parameters).sort(compare)) {
      const histogram = parameters[parameter];
      for (const [key, count] of sortedEntries(histogram)) {
        const signature = parseSignatureKey(key);
        if (count < minUsages && signature.kind !== "default" && signature.kind !== "unknown") {
          rareValues.push({ qname: element.qname, parameter, value: describeSignature(signature), count });
        }
      }

      const fixable = isBucket(parameter)
        ? null
        : fixableValue(withExplicitDefaults(histogram, element, parameter), minUsages);
      if (fixable) {
        fixableParameters.push({ qname: element.qname, parameter, ...fixable });
      }
    }
  }

  const internalUsages = Object.keys(report.calls)
    .filter((qname) => api.get(qname) === undefined)
    .sort(compare);

  return { minUsages, unusedElements, unusedClasses, rareValues, fixableParameters, internalUsages };
}

/**
 * The most common value becomes a constant when fewer than `minUsages`
 * calls deviate from it. An unknown majority suggests nothing.
 */
function fixableValue(
  histogram: Histogram,
  minUsages: number
): { suggestedValue: string; customisations: number } | null {
  const entries = sortedEntries(histogram);
  if (entries.length === 0) return null;

  let [bestKey, bestCount] = entries[0];
  for (const [key, count] of entries) {
    if (count > bestCount) {
      bestKey = key;
      bestCount = count;
    }
  }

  const signature = parseSignatureKey(bestKey);
  if (signature.kind === "unknown") return null;

  const customisations = histogramTotal(histogram) - bestCount;
  return customisations < minUsages ? { suggestedValue: describeSignature(signature), customisations } : null;
}

/**
 * Passing the default explicitly counts as using the default.
 */
function withExplicitDefaults(histogram: Histogram, element: ApiElement, parameter: string): Histogram {
  const declared = element.parameters.find((p) => p.name === parameter)?.defaultValue ?? null;
  const text = declared === null ? null : normalizeLiteralText(declared);
  if (text === null) return histogram;

  const explicitKey = signatureKey(literal(text));
  if (!Object.hasOwn(histogram, explicitKey)) return histogram;

  const defaultKey = signatureKey(DEFAULT_SIGNATURE);
  const folded: Histogram = { ...histogram };
  folded[defaultKey] = (Object.hasOwn(folded, defaultKey) ? folded[defaultKey] : 0) + folded[explicitKey];
  delete folded[explicitKey];
  return folded;
}

function isBucket(parameter: string): boolean {
  return parameter === VARIADIC_POSITIONAL_BUCKET || parameter === VARIADIC_KEYWORD_BUCKET;
}

function sortedEntries(histogram: Histogram): Array<[string, number]> {
  return Object.entries(histogram).sort(([a], [b]) => compare(a, b));
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
