import type { Result } from "@usagelens/core";

import type { CheckpointWriteError, ConfigError } from "../errors.js";
import type { Checkpoint, PartialAggregate } from "../model.js";

/**
 * Durable per-file record of finished work. Writes replace the previous
 * record for the same file and are atomic with respect to a crash.
 */
export interface CheckpointStore {
  /** Prepare the backing storage. Fails when the location is unusable. */
  open(): Promise<Result<void, ConfigError>>;

  recordProcessed(
    file: string,
    fingerprint: string,
    aggregate: PartialAggregate
  ): Promise<Result<Checkpoint, CheckpointWriteError>>;

  /** Whether a record with exactly this fingerprint exists for the file. */
  isProcessed(file: string, fingerprint: string): Promise<boolean>;

  /** Every readable record, one at a time. Corrupt records are skipped. */
  loadAll(): AsyncIterable<Checkpoint>;
}
