import { Err, Ok, type Result } from "@usagelens/core";

import { UsageAggregator } from "../aggregate.js";
import { bindArguments } from "../binder.js";
import { ParseError } from "../errors.js";
import type { CallSite, PartialAggregate, SourceFile } from "../model.js";
import type { CallSiteExtractor } from "../ports/CallSiteExtractor.js";
import type { ApiIndex } from "./ApiIndex.js";

export interface UsageAnalyzerOptions {
  maxFileBytes: number;
}

/**
 * Per-file map step: source text in, PartialAggregate out.
 * Holds no state between files.
 */
export class UsageAnalyzer {
  private readonly mentions: RegExp;

  constructor(
    private readonly api: ApiIndex,
    private readonly extractor: CallSiteExtractor,
    private readonly options: UsageAnalyzerOptions
  ) {
    const roots = api.packageRoots().map(escapeRegex).join("|");
    this.mentions = new RegExp(`\\b(?:${roots})\\b`);
  }

  /** Whether the text mentions the described package at all. */
  isRelevant(text: string): boolean {
    return this.mentions.test(text);
  }

  async analyze(file: SourceFile): Promise<Result<PartialAggregate, ParseError>> {
    const size = Buffer.byteLength(file.text, "utf-8");
    if (size > this.options.maxFileBytes) {
      return Err(new ParseError(file.path, `File is ${size} bytes, limit is ${this.options.maxFileBytes}`));
    }

    const calls = await this.extractor.extract(file);
    if (!calls.ok) {
      return calls;
    }
    return Ok(aggregateCalls(calls.value, this.api));
  }
}

/**
 * Bind every resolved call and fold the observations.
 */
export function aggregateCalls(calls: readonly CallSite[], api: ApiIndex): PartialAggregate {
  const aggregator = new UsageAggregator();

  for (const call of calls) {
    const element = call.target.kind === "resolved" ? api.get(call.target.qname) : undefined;
    if (call.target.kind !== "resolved" || !element) {
      aggregator.recordUnresolved();
      continue;
    }
    aggregator.record(
      element.qname,
      bindArguments(element.parameters, call.arguments, { explicitReceiver: call.target.explicitReceiver })
    );
  }

  return aggregator.toAggregate();
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
