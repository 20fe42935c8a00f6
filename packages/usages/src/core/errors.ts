/**
 * Error taxonomy for a usage run.
 * Only ConfigError is fatal; the others are recorded per file.
 */

import type { Location } from "./model.js";

export type UsageErrorKind = "config" | "file-read" | "parse" | "checkpoint-write";

export abstract class UsageError extends Error {
  abstract readonly kind: UsageErrorKind;
}

/** Bad corpus root, checkpoint directory, API file or option. Aborts before processing. */
export class ConfigError extends UsageError {
  readonly kind = "config";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class FileReadError extends UsageError {
  readonly kind = "file-read";

  constructor(
    readonly file: string,
    message: string
  ) {
    super(message);
    this.name = "FileReadError";
  }
}

export class ParseError extends UsageError {
  readonly kind = "parse";

  constructor(
    readonly file: string,
    message: string,
    readonly location?: Location
  ) {
    super(message);
    this.name = "ParseError";
  }
}

export class CheckpointWriteError extends UsageError {
  readonly kind = "checkpoint-write";

  constructor(
    readonly file: string,
    readonly attempts: number,
    message: string
  ) {
    super(message);
    this.name = "CheckpointWriteError";
  }
}
