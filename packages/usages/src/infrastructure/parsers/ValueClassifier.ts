/**
 * Coarse classification of argument expressions.
 */
import type Parser from "tree-sitter";

import { type StringValue, parseStringToken, reprString } from "../../core/literals.js";
import type { ValueSignature } from "../../core/model.js";
import { UNKNOWN_SIGNATURE, literal, shape } from "../../core/signatures.js";

const CONTAINER_SHAPES: Record<string, string> = {
  list: "list",
  tuple: "tuple",
  dictionary: "dict",
  set: "set",
  list_comprehension: "list",
  dictionary_comprehension: "dict",
  set_comprehension: "set",
  generator_expression: "generator",
  lambda: "lambda",
};

const KEYWORD_LITERALS: Record<string, string> = {
  true: "True",
  false: "False",
  none: "None",
  ellipsis: "...",
};

export function classifyValue(node: Parser.SyntaxNode): ValueSignature {
  switch (node.type) {
    case "integer":
    case "float":
      return literal(node.text);

    case "true":
    case "false":
    case "none":
    case "ellipsis":
      return literal(KEYWORD_LITERALS[node.type]);

    case "string":
      return classifyString(node);

    case "concatenated_string":
      return classifyConcatenated(node);

    case "unary_operator":
      return classifySigned(node);

    case "parenthesized_expression": {
      const inner = node.namedChildren.filter((c) => c.type !== "comment");
      return inner.length === 1 ? classifyValue(inner[0]) : UNKNOWN_SIGNATURE;
    }

    default: {
      const container = CONTAINER_SHAPES[node.type];
      return container ? shape(container) : UNKNOWN_SIGNATURE;
    }
  }
}

function stringValue(node: Parser.SyntaxNode): StringValue | null {
  if (node.namedChildren.some((c) => c.type === "interpolation")) {
    return null;
  }
  return parseStringToken(node.text);
}

/** Spelling is normalised so "a" and 'a' share a histogram entry. */
function classifyString(node: Parser.SyntaxNode): ValueSignature {
  const value = stringValue(node);
  return value ? literal(reprString(value)) : shape("fstring");
}

function classifyConcatenated(node: Parser.SyntaxNode): ValueSignature {
  const pieces = node.namedChildren.filter((c) => c.type === "string").map(stringValue);
  if (pieces.some((p) => p === null)) {
    return shape("fstring");
  }
  const values = pieces.filter((p): p is StringValue => p !== null);
  const bytes = values[0]?.bytes ?? false;
  if (values.some((p) => p.bytes !== bytes)) {
    return shape("str");
  }
  return literal(reprString({ bytes, value: values.map((p) => p.value).join("") }));
}

function classifySigned(node: Parser.SyntaxNode): ValueSignature {
  const operator = node.childForFieldName("operator");
  const argument = node.childForFieldName("argument");
  if (!operator || !argument) {
    return UNKNOWN_SIGNATURE;
  }
  if ((operator.text === "-" || operator.text === "+") && (argument.type === "integer" || argument.type === "float")) {
    return literal(operator.text === "-" ? `-${argument.text}` : argument.text);
  }
  return UNKNOWN_SIGNATURE;
}
