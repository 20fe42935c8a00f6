import { Err, Ok, type Result } from "@usagelens/core";

import { ParseError } from "../../core/errors.js";
import type { CallSite, SourceFile } from "../../core/model.js";
import type { CallSiteExtractor } from "../../core/ports/CallSiteExtractor.js";
import type { ApiIndex } from "../../core/services/ApiIndex.js";
import { CallResolver, type CallResolverOptions, NodeBudgetExceeded } from "./CallResolver.js";
import { TreeSitterParser } from "./TreeSitterParser.js";

/**
 * Python call-site extractor: tree-sitter parse, then alias-aware resolution
 * against one API description.
 */
export class PythonCallExtractor implements CallSiteExtractor {
  private readonly resolver: CallResolver;

  constructor(
    api: ApiIndex,
    options: CallResolverOptions = {},
    private readonly parser: TreeSitterParser = new TreeSitterParser()
  ) {
    this.resolver = new CallResolver(api, options);
  }

  async extract(file: SourceFile): Promise<Result<CallSite[], ParseError>> {
    const parsed = await this.parser.parse(file);
    if (!parsed.ok) {
      return parsed;
    }

    try {
      return Ok(this.resolver.resolve(parsed.value.rootNode, file.path));
    } catch (error) {
      if (error instanceof NodeBudgetExceeded) {
        return Err(new ParseError(file.path, error.message));
      }
      if (error instanceof RangeError) {
        return Err(new ParseError(file.path, `Nesting too deep: ${error.message}`));
      }
      throw error;
    }
  }
}
