/**
 * Usage aggregation and the merge engine.
 *
 * A PartialAggregate is a bag of counters, so merging is plain summation:
 * associative, commutative, with emptyAggregate() as identity.
 */

import type { Histogram, ParameterBindings, PartialAggregate } from "./model.js";
import { signatureKey } from "./signatures.js";

export function emptyAggregate(): PartialAggregate {
  return { callCounts: {}, fileCounts: {}, parameterHistograms: {}, unresolvedCalls: 0 };
}

function addCount(target: Record<string, number>, key: string, amount: number): void {
  target[key] = (Object.hasOwn(target, key) ? target[key] : 0) + amount;
}

// Parameter names such as "constructor" must not hit Object.prototype.
function child<T>(target: Record<string, T>, key: string, create: () => T): T {
  if (!Object.hasOwn(target, key)) {
    target[key] = create();
  }
  return target[key];
}

/**
 * Folds one file's call observations into a PartialAggregate.
 */
export class UsageAggregator {
  private readonly callCounts = new Map<string, number>();
  private readonly histograms = new Map<string, Map<string, Map<string, number>>>();
  private unresolved = 0;

  /** One resolved call site, whatever its bindings. */
  record(qname: string, bindings: ParameterBindings): void {
    this.callCounts.set(qname, (this.callCounts.get(qname) ?? 0) + 1);

    let parameters = this.histograms.get(qname);
    if (!parameters) {
      parameters = new Map();
      this.histograms.set(qname, parameters);
    }

    for (const [parameter, signature] of bindings) {
      let histogram = parameters.get(parameter);
      if (!histogram) {
        histogram = new Map();
        parameters.set(parameter, histogram);
      }
      const key = signatureKey(signature);
      histogram.set(key, (histogram.get(key) ?? 0) + 1);
    }
  }

  recordUnresolved(): void {
    this.unresolved++;
  }

  /** Produce the immutable aggregate for everything recorded so far. */
  toAggregate(): PartialAggregate {
    const aggregate = emptyAggregate();
    for (const [qname, count] of this.callCounts) {
      aggregate.callCounts[qname] = count;
      aggregate.fileCounts[qname] = 1;
    }
    for (const [qname, parameters] of this.histograms) {
      const perParameter: Record<string, Histogram> = {};
      for (const [parameter, histogram] of parameters) {
        perParameter[parameter] = Object.fromEntries(histogram);
      }
      aggregate.parameterHistograms[qname] = perParameter;
    }
    aggregate.unresolvedCalls = this.unresolved;
    return aggregate;
  }
}

/**
 * Merge any number of aggregates into a new one. Inputs are not modified.
 */
export function mergeAggregates(aggregates: Iterable<PartialAggregate>): PartialAggregate {
  const result = emptyAggregate();
  for (const aggregate of aggregates) {
    addAggregate(result, aggregate);
  }
  return result;
}

/**
 * Add `aggregate` into `target` in place, for folding a stream without
 * holding every input.
 */
export function addAggregate(target: PartialAggregate, aggregate: PartialAggregate): void {
  for (const [qname, count] of Object.entries(aggregate.callCounts)) {
    addCount(target.callCounts, qname, count);
  }
  for (const [qname, count] of Object.entries(aggregate.fileCounts)) {
    addCount(target.fileCounts, qname, count);
  }
  for (const [qname, parameters] of Object.entries(aggregate.parameterHistograms)) {
    const perParameter = child<Record<string, Histogram>>(target.parameterHistograms, qname, () => ({}));
    for (const [parameter, histogram] of Object.entries(parameters)) {
      const targetHistogram = child<Histogram>(perParameter, parameter, () => ({}));
      for (const [key, count] of Object.entries(histogram)) {
        addCount(targetHistogram, key, count);
      }
    }
  }
  target.unresolvedCalls += aggregate.unresolvedCalls;
}

export function mergeTwo(left: PartialAggregate, right: PartialAggregate): PartialAggregate {
  return mergeAggregates([left, right]);
}

export function totalResolvedCalls(aggregate: PartialAggregate): number {
  return Object.values(aggregate.callCounts).reduce((sum, count) => sum + count, 0);
}

export function histogramTotal(histogram: Histogram): number {
  return Object.values(histogram).reduce((sum, count) => sum + count, 0);
}
