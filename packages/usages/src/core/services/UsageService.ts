/**
 * Usage run orchestration.
 *
 * Walk the corpus, skip files whose fingerprint is already checkpointed,
 * analyse the rest on a bounded pool, checkpoint each result, then merge the
 * checkpoints of the current corpus into the final report.
 */

import { createHash } from "node:crypto";
import path from "node:path";

import { Err, Ok, type Logger, type Result, createLogger, tryCatchAsync } from "@usagelens/core";
import * as z from "zod/v4";

import { addAggregate, emptyAggregate, totalResolvedCalls } from "../aggregate.js";
import { type UsageRunInput, type UsageRunOptions, UsageRunOptionsSchema } from "../config.js";
import { ConfigError, ParseError } from "../errors.js";
import type { ApiDescription, FileFailure, PartialAggregate, RunSummary, SourceFile, UsageReport } from "../model.js";
import type { CallSiteExtractor } from "../ports/CallSiteExtractor.js";
import type { CheckpointStore } from "../ports/CheckpointStore.js";
import type { CorpusWalker } from "../ports/CorpusWalker.js";
import type { FileSystem } from "../ports/FileSystem.js";
import { ApiIndex } from "./ApiIndex.js";
import { UsageAnalyzer } from "./UsageAnalyzer.js";
import { forEachBounded } from "./pool.js";

export interface UsageServiceDeps {
  walker: CorpusWalker;
  fs: FileSystem;
  loadApi: (file: string) => Promise<Result<ApiDescription, ConfigError>>;
  readExclusions: (file: string) => Promise<Result<string[], ConfigError>>;
  openStore: (directory: string, retries: number) => CheckpointStore;
  createExtractor: (api: ApiIndex, maxNodes: number) => CallSiteExtractor;
  logger?: Logger;
}

export type UsageRunRequest = UsageRunInput & {
  /** In-memory description; takes precedence over apiFile */
  api?: ApiDescription;
};

export interface UsageRunResult {
  summary: RunSummary;
  report: UsageReport;
  outFile?: string;
}

interface RunContext {
  options: UsageRunOptions;
  store: CheckpointStore;
  analyzer: UsageAnalyzer;
  summary: RunSummary;
  /** Fingerprint of every corpus file read in this run */
  fingerprints: Map<string, string>;
}

export class UsageService {
  private readonly logger: Logger;

  constructor(private readonly deps: UsageServiceDeps) {
    this.logger = deps.logger ?? createLogger("usages");
  }

  /**
   * Execute one run. Only configuration problems fail the run; per-file
   * failures are listed in the summary.
   */
  async run(request: UsageRunRequest): Promise<Result<UsageRunResult, ConfigError>> {
    const parsed = UsageRunOptionsSchema.safeParse(request);
    if (!parsed.success) {
      return Err(new ConfigError(`Invalid options: ${z.prettifyError(parsed.error)}`));
    }
    const options = parsed.data;

    const description = await this.resolveApi(request.api, options.apiFile);
    if (!description.ok) return description;

    const exclusions = await this.resolveExclusions(options);
    if (!exclusions.ok) return exclusions;

    if (options.outFile && !(await this.deps.fs.isDirectory(path.dirname(path.resolve(options.outFile))))) {
      return Err(new ConfigError(`Output directory does not exist: ${path.dirname(options.outFile)}`));
    }

    const files = await this.deps.walker.walk(options.srcDir, exclusions.value);
    if (!files.ok) return files;

    const store = this.deps.openStore(options.tmpDir, options.checkpointRetries);
    const opened = await store.open();
    if (!opened.ok) return opened;

    const api = new ApiIndex(description.value);
    const context: RunContext = {
      options,
      store,
      analyzer: new UsageAnalyzer(api, this.deps.createExtractor(api, options.maxNodes), {
        maxFileBytes: options.maxFileBytes,
      }),
      summary: emptySummary(files.value.length),
      fingerprints: new Map(),
    };

    this.logger.info(`Analysing ${files.value.length} files under ${options.srcDir}`);
    await forEachBounded(files.value, options.concurrency, async (file, index) => {
      this.logger.info(`Working on ${file} (${index + 1}/${files.value.length})`);
      await this.processFile(context, file);
    });

    const aggregate = await this.mergeCheckpoints(context);
    const report = toReport(api, aggregate);
    const summary = context.summary;
    summary.failed = summary.failures.length;
    summary.resolvedCalls = totalResolvedCalls(aggregate);
    summary.unresolvedCalls = aggregate.unresolvedCalls;

    if (options.outFile) {
      const written = await this.deps.fs.writeAtomic(options.outFile, JSON.stringify(report, null, 2));
      if (!written.ok) {
        return Err(new ConfigError(`Cannot write ${options.outFile}: ${written.error.message}`));
      }
    }

    this.logger.info(formatSummary(summary));
    return Ok({ summary, report, outFile: options.outFile });
  }

  private async resolveApi(
    inline: ApiDescription | undefined,
    apiFile: string | undefined
  ): Promise<Result<ApiDescription, ConfigError>> {
    if (inline) return Ok(inline);
    if (!apiFile) return Err(new ConfigError("An API description (api or apiFile) is required"));
    return this.deps.loadApi(apiFile);
  }

  private async resolveExclusions(options: UsageRunOptions): Promise<Result<string[], ConfigError>> {
    if (!options.excludeFile) return Ok(options.exclude);
    const fromFile = await this.deps.readExclusions(options.excludeFile);
    if (!fromFile.ok) return fromFile;
    return Ok([...options.exclude, ...fromFile.value]);
  }

  private async processFile(context: RunContext, file: string): Promise<void> {
    const { options, store, analyzer, summary } = context;

    const text = await this.deps.fs.read(path.join(options.srcDir, file));
    if (!text.ok) {
      this.fail(summary, { file, kind: "read", message: text.error.message });
      summary.readFailures++;
      return;
    }

    const fingerprint = fingerprintOf(text.value);
    context.fingerprints.set(file, fingerprint);

    if (await store.isProcessed(file, fingerprint)) {
      this.logger.info(`Skipping ${file}: already processed`);
      summary.skipped++;
      return;
    }

    let aggregate: PartialAggregate;
    const relevant = !options.skipIrrelevantFiles || analyzer.isRelevant(text.value);
    if (relevant) {
      const analysed = await this.analyze(analyzer, { path: file, text: text.value });
      if (!analysed.ok) {
        this.fail(summary, {
          file,
          kind: "parse",
          message: analysed.error.message,
          location: analysed.error.location,
        });
        summary.parseFailures++;
        return;
      }
      aggregate = analysed.value;
    } else {
      aggregate = emptyAggregate();
    }

    const recorded = await store.recordProcessed(file, fingerprint, aggregate);
    if (!recorded.ok) {
      // Left unrecorded: the next run picks the file up again
      this.fail(summary, { file, kind: "checkpoint", message: recorded.error.message });
      summary.checkpointFailures++;
      return;
    }

    if (relevant) summary.processed++;
    else summary.irrelevant++;
  }

  /** Analysis of one file; anything it throws becomes that file's parse failure. */
  private async analyze(analyzer: UsageAnalyzer, file: SourceFile): Promise<Result<PartialAggregate, ParseError>> {
    const outcome = await tryCatchAsync(() => analyzer.analyze(file));
    if (!outcome.ok) {
      return Err(new ParseError(file.path, `Analysis failed: ${outcome.error.message}`));
    }
    return outcome.value;
  }

  /**
   * Exactly one contribution per current corpus file: its checkpoint, if the
   * fingerprint still matches.
   */
  private async mergeCheckpoints(context: RunContext): Promise<PartialAggregate> {
    const merged = emptyAggregate();
    for await (const record of context.store.loadAll()) {
      if (context.fingerprints.get(record.file) === record.fingerprint) {
        addAggregate(merged, record.aggregate);
      }
    }
    return merged;
  }

  private fail(summary: RunSummary, failure: FileFailure): void {
    const where = failure.location ? `:${failure.location.line}:${failure.location.column}` : "";
    this.logger.warn(`${failure.kind} failure in ${failure.file}${where}: ${failure.message}`);
    summary.failures.push(failure);
  }
}

export function fingerprintOf(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex");
}

export function toReport(api: ApiIndex, aggregate: PartialAggregate): UsageReport {
  return {
    package: api.package,
    version: api.version,
    calls: aggregate.callCounts,
    files: aggregate.fileCounts,
    parameters: aggregate.parameterHistograms,
    unresolvedCalls: aggregate.unresolvedCalls,
  };
}

function emptySummary(filesTotal: number): RunSummary {
  return {
    filesTotal,
    processed: 0,
    skipped: 0,
    irrelevant: 0,
    failed: 0,
    parseFailures: 0,
    readFailures: 0,
    checkpointFailures: 0,
    resolvedCalls: 0,
    unresolvedCalls: 0,
    failures: [],
  };
}

export function formatSummary(summary: RunSummary): string {
  return [
    `Files: ${summary.filesTotal} total, ${summary.processed} processed, ${summary.skipped} skipped, ` +
      `${summary.irrelevant} irrelevant, ${summary.failed} failed`,
    `Failures: ${summary.parseFailures} parse, ${summary.readFailures} read, ${summary.checkpointFailures} checkpoint`,
    `Calls: ${summary.resolvedCalls} resolved, ${summary.unresolvedCalls} unresolved`,
  ].join("\n");
}
