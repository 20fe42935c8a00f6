import type { Result } from "@usagelens/core";

import type { ConfigError } from "../errors.js";

/**
 * Port for enumerating the corpus.
 */
export interface CorpusWalker {
  /**
   * List source files under a root directory.
   *
   * @param root - Corpus root; a missing or unreadable root is a ConfigError
   * @param exclude - Paths or glob patterns, relative to the root
   * @returns "/"-separated paths relative to the root, in lexicographic order
   */
  walk(root: string, exclude: string[]): Promise<Result<string[], ConfigError>>;
}
