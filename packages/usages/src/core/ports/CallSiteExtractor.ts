import type { Result } from "@usagelens/core";

import type { ParseError } from "../errors.js";
import type { CallSite, SourceFile } from "../model.js";

/**
 * Port for turning one source file into resolved and unresolved call sites.
 */
export interface CallSiteExtractor {
  /**
   * Extract every call site of a file.
   *
   * @returns Call sites in source order, or a ParseError when the file
   * cannot be parsed or exceeds the node budget
   */
  extract(file: SourceFile): Promise<Result<CallSite[], ParseError>>;
}
