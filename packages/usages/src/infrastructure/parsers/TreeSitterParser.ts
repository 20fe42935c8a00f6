import { Err, Ok, type Result } from "@usagelens/core";
import Parser from "tree-sitter";

import { ParseError } from "../../core/errors.js";
import type { Location, SourceFile } from "../../core/model.js";

// Tree-sitter language type (uses any in the typings)
type TreeSitterLanguage = unknown;

// Read callback chunk size; whole-string input is capped by the native binding
const CHUNK_SIZE = 16 * 1024;

let pythonGrammar: Promise<TreeSitterLanguage> | undefined;

async function loadPythonGrammar(): Promise<TreeSitterLanguage> {
  const mod = await import("tree-sitter-python");
  return mod.default;
}

/**
 * Tree-sitter based Python parser. A tree with any ERROR or missing node is
 * rejected as a whole.
 */
export class TreeSitterParser {
  private parser: Parser | undefined;

  async parse(file: SourceFile): Promise<Result<Parser.Tree, ParseError>> {
    try {
      const parser = await this.getParser();
      const text = file.text;
      const tree = parser.parse((index: number) => text.slice(index, index + CHUNK_SIZE));

      const error = firstSyntaxError(tree.rootNode);
      if (error) {
        return Err(new ParseError(file.path, error.message, error.location));
      }
      return Ok(tree);
    } catch (error) {
      if (error instanceof RangeError) {
        return Err(new ParseError(file.path, `Nesting too deep: ${error.message}`));
      }
      return Err(new ParseError(file.path, error instanceof Error ? error.message : String(error)));
    }
  }

  private async getParser(): Promise<Parser> {
    if (this.parser) return this.parser;

    pythonGrammar ??= loadPythonGrammar();
    const parser = new Parser();
    parser.setLanguage(await pythonGrammar);
    this.parser = parser;
    return parser;
  }
}

/**
 * First ERROR or missing node in document order.
 */
export function firstSyntaxError(root: Parser.SyntaxNode): { message: string; location: Location } | null {
  const stack: Parser.SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (node.type === "ERROR" || node.isMissing) {
      return {
        message: node.isMissing ? `Missing: ${node.type}` : "Syntax error",
        location: { line: node.startPosition.row + 1, column: node.startPosition.column + 1 },
      };
    }

    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
  return null;
}
