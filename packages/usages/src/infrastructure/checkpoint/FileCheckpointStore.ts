/**
 * Checkpoint persistence.
 * One JSON record per corpus file, replaced with write-temp-then-rename.
 */

import { createHash, randomBytes } from "node:crypto";
import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { Err, Ok, type Logger, type Result, silentLogger, toError } from "@usagelens/core";
import * as z from "zod/v4";

import { CheckpointWriteError, ConfigError } from "../../core/errors.js";
import type { Checkpoint, PartialAggregate } from "../../core/model.js";
import type { CheckpointStore } from "../../core/ports/CheckpointStore.js";

const count = z.number().int().nonnegative();

const CheckpointSchema = z.object({
  file: z.string(),
  fingerprint: z.string(),
  processed: z.literal(true),
  aggregate: z.object({
    callCounts: z.record(z.string(), count),
    fileCounts: z.record(z.string(), count),
    parameterHistograms: z.record(z.string(), z.record(z.string(), z.record(z.string(), count))),
    unresolvedCalls: count,
  }),
});

export interface FileCheckpointStoreOptions {
  /** Write attempts per record before giving up */
  retries?: number;
  logger?: Logger;
}

export class FileCheckpointStore implements CheckpointStore {
  private readonly retries: number;
  private readonly logger: Logger;
  // Per-path write chains: one writer at a time per file, none across files
  private readonly pending = new Map<string, Promise<unknown>>();

  constructor(
    private readonly directory: string,
    options: FileCheckpointStoreOptions = {}
  ) {
    this.retries = Math.max(1, options.retries ?? 3);
    this.logger = options.logger ?? silentLogger;
  }

  async open(): Promise<Result<void, ConfigError>> {
    try {
      await mkdir(this.directory, { recursive: true });
      return Ok(undefined);
    } catch (error) {
      return Err(new ConfigError(`Cannot use checkpoint directory ${this.directory}: ${toError(error).message}`));
    }
  }

  recordProcessed(
    file: string,
    fingerprint: string,
    aggregate: PartialAggregate
  ): Promise<Result<Checkpoint, CheckpointWriteError>> {
    const checkpoint: Checkpoint = { file, fingerprint, processed: true, aggregate };
    const previous = this.pending.get(file) ?? Promise.resolve();
    const write: Promise<Result<Checkpoint, CheckpointWriteError>> = previous
      .then(() => this.writeWithRetry(checkpoint))
      .then((result) => {
        if (this.pending.get(file) === write) {
          this.pending.delete(file);
        }
        return result;
      });

    this.pending.set(file, write);
    return write;
  }

  async isProcessed(file: string, fingerprint: string): Promise<boolean> {
    const record = await this.load(file);
    return record?.fingerprint === fingerprint;
  }

  /** The record for one file, or null when absent or unreadable. */
  async load(file: string): Promise<Checkpoint | null> {
    return this.readRecord(this.recordPath(file), file);
  }

  async *loadAll(): AsyncGenerator<Checkpoint> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      this.logger.warn(`Cannot list checkpoint directory ${this.directory}: ${toError(error).message}`);
      return;
    }

    for (const entry of entries.filter((e) => e.endsWith(".json")).sort()) {
      const record = await this.readRecord(path.join(this.directory, entry));
      if (record) {
        yield record;
      }
    }
  }

  private recordPath(file: string): string {
    return path.join(this.directory, checkpointFileName(file));
  }

  private async readRecord(recordPath: string, expectedFile?: string): Promise<Checkpoint | null> {
    let text: string;
    try {
      text = await readFile(recordPath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      this.logger.warn(`Cannot read checkpoint ${recordPath}: ${toError(error).message}`);
      return null;
    }

    try {
      const parsed = CheckpointSchema.safeParse(JSON.parse(text));
      if (!parsed.success) {
        this.logger.warn(`Ignoring malformed checkpoint ${recordPath}`);
        return null;
      }
      if (expectedFile !== undefined && parsed.data.file !== expectedFile) {
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.logger.warn(`Ignoring unreadable checkpoint ${recordPath}: ${toError(error).message}`);
      return null;
    }
  }

  private async writeWithRetry(checkpoint: Checkpoint): Promise<Result<Checkpoint, CheckpointWriteError>> {
    const target = this.recordPath(checkpoint.file);
    const data = JSON.stringify(checkpoint);
    let lastError: Error = new Error("no attempt made");

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      const tmp = `${target}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
      try {
        await writeFile(tmp, data, "utf-8");
        await rename(tmp, target); // Atomic on POSIX
        return Ok(checkpoint);
      } catch (error) {
        lastError = toError(error);
        this.logger.warn(`Checkpoint write for ${checkpoint.file} failed (attempt ${attempt}/${this.retries}): ${lastError.message}`);
        await rm(tmp, { force: true }).catch((cleanupError: unknown) => {
          this.logger.warn(`Could not remove ${tmp}: ${toError(cleanupError).message}`);
        });
      }
    }

    return Err(new CheckpointWriteError(checkpoint.file, this.retries, lastError.message));
  }
}

/** Record file name for a corpus path. */
export function checkpointFileName(file: string): string {
  return `${createHash("sha256").update(file, "utf-8").digest("hex")}.json`;
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
