/**
 * Walks a Python syntax tree in program order, maintaining alias scopes,
 * and emits one CallSite per call expression.
 */
import type Parser from "tree-sitter";

import type { CallArgument, CallSite, CallTarget, UnresolvedReason } from "../../core/model.js";
import type { ApiIndex } from "../../core/services/ApiIndex.js";
import { UNKNOWN_SIGNATURE, shape } from "../../core/signatures.js";
import { type AliasBinding, AliasScope } from "./AliasScope.js";
import { applyFromImport, applyImport } from "./ImportResolver.js";
import { classifyValue } from "./ValueClassifier.js";

export const DEFAULT_MAX_NODES = 500_000;

export class NodeBudgetExceeded extends Error {
  constructor(readonly limit: number) {
    super(`File exceeds the budget of ${limit} syntax nodes`);
    this.name = "NodeBudgetExceeded";
  }
}

/**
 * What an expression denotes, as far as static aliasing can tell.
 * - value: the object at `path` itself (module, class, function)
 * - instance: an instance of the class at `classQname`
 * - member: an attribute looked up through an instance
 */
type Reference =
  | { kind: "value"; path: string }
  | { kind: "instance"; classQname: string }
  | { kind: "member"; path: string }
  | { kind: "unresolved"; reason: UnresolvedReason };

const LOCAL: AliasBinding = { kind: "local" };
const DYNAMIC: Reference = { kind: "unresolved", reason: "dynamic" };

const DESTRUCTURING = new Set([
  "pattern_list",
  "tuple_pattern",
  "list_pattern",
  "tuple",
  "list",
  "expression_list",
  "parenthesized_expression",
  "list_splat_pattern",
  "list_splat",
]);

const COMPREHENSIONS = new Set([
  "list_comprehension",
  "set_comprehension",
  "dictionary_comprehension",
  "generator_expression",
]);

export interface CallResolverOptions {
  maxNodes?: number;
}

export class CallResolver {
  private readonly maxNodes: number;

  constructor(
    private readonly api: ApiIndex,
    options: CallResolverOptions = {}
  ) {
    this.maxNodes = options.maxNodes ?? DEFAULT_MAX_NODES;
  }

  /**
   * Collect the call sites of one module. Throws NodeBudgetExceeded when the
   * tree is larger than the configured budget.
   */
  resolve(root: Parser.SyntaxNode, file: string): CallSite[] {
    const walk = new ModuleWalk(this.api, file, this.maxNodes);
    walk.visit(root, new AliasScope("module"));
    return walk.calls;
  }
}

class ModuleWalk {
  readonly calls: CallSite[] = [];
  private visited = 0;

  constructor(
    private readonly api: ApiIndex,
    private readonly file: string,
    private readonly maxNodes: number
  ) {}

  visit(node: Parser.SyntaxNode, scope: AliasScope): void {
    if (++this.visited > this.maxNodes) {
      throw new NodeBudgetExceeded(this.maxNodes);
    }

    switch (node.type) {
      case "import_statement":
        applyImport(node, scope);
        return;
      case "import_from_statement":
        applyFromImport(node, scope, this.api);
        return;
      case "future_import_statement":
      case "comment":
        return;
      case "call":
        this.visitCall(node, scope);
        return;
      case "assignment":
        this.visitAssignment(node, scope);
        return;
      case "augmented_assignment":
        this.visitField(node, "right", scope);
        this.bindTarget(node.childForFieldName("left"), LOCAL, scope);
        return;
      case "named_expression":
        this.visitField(node, "value", scope);
        this.bindTarget(node.childForFieldName("name"), LOCAL, scope);
        return;
      case "for_statement":
        this.visitField(node, "right", scope);
        this.bindTarget(node.childForFieldName("left"), LOCAL, scope);
        this.visitField(node, "body", scope);
        this.visitField(node, "alternative", scope);
        return;
      case "as_pattern":
        this.visitAsPattern(node, scope);
        return;
      case "except_clause":
        this.visitExceptClause(node, scope);
        return;
      case "function_definition":
        this.visitFunction(node, scope);
        return;
      case "class_definition":
        this.visitClass(node, scope);
        return;
      case "lambda":
        this.visitLambda(node, scope);
        return;
      case "global_statement":
        for (const name of identifiers(node)) scope.declareGlobal(name);
        return;
      case "nonlocal_statement":
        for (const name of identifiers(node)) scope.declareNonlocal(name);
        return;
      case "delete_statement":
        for (const target of node.namedChildren) this.bindTarget(target, LOCAL, scope);
        return;
      default:
        if (COMPREHENSIONS.has(node.type)) {
          this.visitComprehension(node, scope);
        } else {
          this.visitChildren(node, scope);
        }
    }
  }

  private visitChildren(node: Parser.SyntaxNode, scope: AliasScope): void {
    for (const child of node.namedChildren) {
      this.visit(child, scope);
    }
  }

  private visitField(node: Parser.SyntaxNode, field: string, scope: AliasScope): void {
    const child = node.childForFieldName(field);
    if (child) {
      this.visit(child, scope);
    }
  }

  // ==========================================================================
  // Calls
  // ==========================================================================

  private visitCall(node: Parser.SyntaxNode, scope: AliasScope): void {
    const callee = node.childForFieldName("function");
    const args = node.childForFieldName("arguments");

    if (callee) {
      this.calls.push({
        file: this.file,
        location: { line: node.startPosition.row + 1, column: node.startPosition.column + 1 },
        target: this.targetOf(callee, scope),
        arguments: args ? extractArguments(args) : [],
      });
      // Nested calls in the callee, e.g. pkg.make().run()
      this.visit(callee, scope);
    }
    if (args) {
      this.visit(args, scope);
    }
  }

  private targetOf(callee: Parser.SyntaxNode, scope: AliasScope): CallTarget {
    const reference = this.reference(callee, scope);
    const text = calleeText(callee);

    switch (reference.kind) {
      case "unresolved":
        return { kind: "unresolved", reason: reference.reason, callee: text };
      case "instance":
        return this.callableTarget(`${reference.classQname}.__call__`, false, text);
      case "value":
        return this.callableTarget(reference.path, true, text);
      case "member":
        return this.callableTarget(reference.path, false, text);
    }
  }

  /**
   * Look a composed path up in the API. Methods reached through their class
   * (not an instance) receive the receiver as first positional argument.
   */
  private callableTarget(path: string, throughClass: boolean, callee: string): CallTarget {
    const qname = this.api.canonicalize(path);
    const element = this.api.get(qname);

    switch (element?.kind) {
      case "function":
        return { kind: "resolved", qname, explicitReceiver: false };
      case "method":
        return {
          kind: "resolved",
          qname,
          explicitReceiver: throughClass && (element.receiver ?? "instance") === "instance",
        };
      case "class": {
        const constructor = this.api.constructorOf(qname);
        return constructor
          ? { kind: "resolved", qname: constructor.qname, explicitReceiver: false }
          : { kind: "unresolved", reason: "no-constructor", callee };
      }
      default:
        return { kind: "unresolved", reason: "not-in-api", callee };
    }
  }

  // ==========================================================================
  // Expression references
  // ==========================================================================

  private reference(node: Parser.SyntaxNode, scope: AliasScope): Reference {
    switch (node.type) {
      case "identifier":
        return this.nameReference(node.text, scope);

      case "attribute": {
        const object = node.childForFieldName("object");
        const attribute = node.childForFieldName("attribute");
        if (!object || !attribute) {
          return DYNAMIC;
        }
        const base = this.reference(object, scope);
        switch (base.kind) {
          case "value":
            return { kind: "value", path: `${base.path}.${attribute.text}` };
          case "instance":
            return { kind: "member", path: `${base.classQname}.${attribute.text}` };
          case "member":
            return DYNAMIC;
          case "unresolved":
            return base;
        }
      }

      case "call": {
        const callee = node.childForFieldName("function");
        return callee ? this.constructedInstance(callee, scope) : DYNAMIC;
      }

      case "parenthesized_expression": {
        const inner = node.namedChildren.filter((c) => c.type !== "comment");
        return inner.length === 1 ? this.reference(inner[0], scope) : DYNAMIC;
      }

      default:
        return DYNAMIC;
    }
  }

  private nameReference(name: string, scope: AliasScope): Reference {
    const found = scope.lookup(name);

    switch (found.kind) {
      case "bound": {
        const binding = found.binding;
        if (binding.kind === "origin") {
          return { kind: "value", path: binding.origin };
        }
        if (binding.kind === "instance") {
          return { kind: "instance", classQname: binding.classQname };
        }
        return { kind: "unresolved", reason: binding.kind === "ambiguous" ? "ambiguous" : "shadowed" };
      }
      case "wildcard": {
        if (found.foreign) {
          return { kind: "unresolved", reason: "ambiguous" };
        }
        const candidates = this.api.findByBareName(name);
        if (candidates.length === 1) {
          return { kind: "value", path: candidates[0].qname };
        }
        return { kind: "unresolved", reason: candidates.length === 0 ? "unbound-name" : "ambiguous" };
      }
      case "missing":
        return { kind: "unresolved", reason: "unbound-name" };
    }
  }

  /** `pkg.Cls(...)` evaluates to an instance of pkg.Cls; other calls are opaque. */
  private constructedInstance(callee: Parser.SyntaxNode, scope: AliasScope): Reference {
    const reference = this.reference(callee, scope);
    if (reference.kind !== "value" && reference.kind !== "member") {
      return DYNAMIC;
    }
    const qname = this.api.canonicalize(reference.path);
    return this.api.get(qname)?.kind === "class" ? { kind: "instance", classQname: qname } : DYNAMIC;
  }

  // ==========================================================================
  // Bindings
  // ==========================================================================

  private visitAssignment(node: Parser.SyntaxNode, scope: AliasScope): void {
    const targets: Parser.SyntaxNode[] = [];
    let current: Parser.SyntaxNode | null = node;
    let value: Parser.SyntaxNode | null = null;

    // a = b = value
    while (current && current.type === "assignment") {
      const left = current.childForFieldName("left");
      if (left) targets.push(left);
      this.visitField(current, "type", scope);
      value = current.childForFieldName("right");
      current = value;
    }

    // Bare annotation: `x: int`
    if (!value) {
      return;
    }

    this.visit(value, scope);
    const binding = this.bindingFor(value, scope);
    for (const target of targets) {
      this.bindTarget(target, binding, scope);
    }
  }

  /**
   * Dotted names that resolve are copied as aliases, constructor calls bind
   * an instance, and anything else makes the name local.
   */
  private bindingFor(value: Parser.SyntaxNode, scope: AliasScope): AliasBinding {
    if (value.type !== "identifier" && value.type !== "attribute" && value.type !== "call") {
      return LOCAL;
    }
    const reference = this.reference(value, scope);
    if (reference.kind === "instance") {
      return { kind: "instance", classQname: reference.classQname };
    }
    if (reference.kind === "value" && value.type !== "call") {
      return { kind: "origin", origin: reference.path, via: "assignment" };
    }
    return LOCAL;
  }

  private bindTarget(target: Parser.SyntaxNode | null, binding: AliasBinding, scope: AliasScope): void {
    if (!target) {
      return;
    }
    if (target.type === "identifier") {
      scope.bind(target.text, binding);
    } else if (DESTRUCTURING.has(target.type)) {
      for (const child of target.namedChildren) {
        this.bindTarget(child, LOCAL, scope);
      }
    } else {
      // obj.attr = ..., obj[key] = ...: no name is rebound, but the target may hold calls
      this.visit(target, scope);
    }
  }

  private visitAsPattern(node: Parser.SyntaxNode, scope: AliasScope): void {
    const alias = node.childForFieldName("alias");
    for (const child of node.namedChildren) {
      if (!alias || child.startIndex !== alias.startIndex) {
        this.visit(child, scope);
      }
    }
    if (alias) {
      for (const target of alias.type === "as_pattern_target" ? alias.namedChildren : [alias]) {
        this.bindTarget(target, LOCAL, scope);
      }
    }
  }

  private visitExceptClause(node: Parser.SyntaxNode, scope: AliasScope): void {
    let afterAs = false;
    for (const child of node.children) {
      if (child.type === "as") {
        afterAs = true;
      } else if (afterAs && child.isNamed) {
        this.bindTarget(child, LOCAL, scope);
        afterAs = false;
      } else if (child.isNamed) {
        this.visit(child, scope);
      }
    }
  }

  private visitFunction(node: Parser.SyntaxNode, scope: AliasScope): void {
    const parameters = node.childForFieldName("parameters");
    if (parameters) {
      this.visitParameterDefaults(parameters, scope);
    }
    this.visitField(node, "return_type", scope);

    const name = node.childForFieldName("name");
    if (name) {
      scope.shadow(name.text);
    }

    const inner = scope.child("function");
    if (parameters) {
      this.bindParameters(parameters, inner);
    }
    this.visitField(node, "body", inner);
  }

  private visitLambda(node: Parser.SyntaxNode, scope: AliasScope): void {
    const parameters = node.childForFieldName("parameters");
    if (parameters) {
      this.visitParameterDefaults(parameters, scope);
    }
    const inner = scope.child("function");
    if (parameters) {
      this.bindParameters(parameters, inner);
    }
    this.visitField(node, "body", inner);
  }

  private visitClass(node: Parser.SyntaxNode, scope: AliasScope): void {
    this.visitField(node, "superclasses", scope);
    this.visitField(node, "body", scope.child("class"));

    const name = node.childForFieldName("name");
    if (name) {
      scope.shadow(name.text);
    }
  }

  /** Defaults and annotations are evaluated in the enclosing scope. */
  private visitParameterDefaults(parameters: Parser.SyntaxNode, scope: AliasScope): void {
    for (const parameter of parameters.namedChildren) {
      this.visitField(parameter, "value", scope);
      this.visitField(parameter, "type", scope);
    }
  }

  private bindParameters(parameters: Parser.SyntaxNode, inner: AliasScope): void {
    for (const parameter of parameters.namedChildren) {
      const name = parameterName(parameter);
      if (name) {
        inner.shadow(name);
      }
    }
  }

  /** Loop variables shadow inside the comprehension only. */
  private visitComprehension(node: Parser.SyntaxNode, scope: AliasScope): void {
    const inner = scope.child("function");
    const clauses = node.namedChildren.filter((c) => c.type === "for_in_clause");

    for (const clause of clauses) {
      this.visitField(clause, "right", inner);
      this.bindTarget(clause.childForFieldName("left"), LOCAL, inner);
    }
    for (const child of node.namedChildren) {
      if (child.type !== "for_in_clause") {
        this.visit(child, inner);
      }
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Arguments in source order, each with its value signature.
 */
export function extractArguments(node: Parser.SyntaxNode): CallArgument[] {
  if (node.type === "generator_expression") {
    return [{ kind: "positional", value: shape("generator") }];
  }

  const args: CallArgument[] = [];
  for (const child of node.namedChildren) {
    switch (child.type) {
      case "comment":
        break;
      case "keyword_argument": {
        const name = child.childForFieldName("name");
        const value = child.childForFieldName("value");
        if (name) {
          args.push({ kind: "keyword", name: name.text, value: value ? classifyValue(value) : UNKNOWN_SIGNATURE });
        }
        break;
      }
      case "list_splat":
        args.push({ kind: "star" });
        break;
      case "dictionary_splat":
        args.push({ kind: "double_star" });
        break;
      default:
        args.push({ kind: "positional", value: classifyValue(child) });
    }
  }
  return args;
}

function parameterName(parameter: Parser.SyntaxNode): string | null {
  if (parameter.type === "identifier") {
    return parameter.text;
  }
  const named = parameter.childForFieldName("name");
  if (named) {
    return parameterName(named);
  }
  const first = parameter.namedChildren[0];
  if (first && (parameter.type === "typed_parameter" || parameter.type.endsWith("splat_pattern"))) {
    return parameterName(first);
  }
  return null;
}

function identifiers(node: Parser.SyntaxNode): string[] {
  return node.namedChildren.filter((c) => c.type === "identifier").map((c) => c.text);
}

function calleeText(node: Parser.SyntaxNode): string {
  const firstLine = node.text.split("\n")[0];
  return firstLine.length > 80 ? `${firstLine.slice(0, 77)}...` : firstLine;
}
