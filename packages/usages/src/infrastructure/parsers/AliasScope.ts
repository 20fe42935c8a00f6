/**
 * Per-file alias tables with Python-like scoping.
 *
 * Bindings are applied in program order, so the table at any point reflects
 * the last write in the governing scope. Class bodies are invisible to the
 * functions nested inside them, as in Python.
 */

export type AliasBinding =
  /** Name refers to a dotted origin (module, function or class) */
  | { kind: "origin"; origin: string; via: "import" | "from-import" | "wildcard" | "assignment" }
  /** Name holds an instance of the class at `classQname` */
  | { kind: "instance"; classQname: string }
  /** Name was rebound to something that is not an import */
  | { kind: "local" }
  /** Name may come from more than one wildcard import */
  | { kind: "ambiguous" };

export type ScopeKind = "module" | "function" | "class";

export type Lookup =
  | { kind: "bound"; binding: AliasBinding }
  | { kind: "wildcard"; modules: string[]; foreign: boolean }
  | { kind: "missing" };

export class AliasScope {
  private readonly bindings = new Map<string, AliasBinding>();
  private readonly wildcardModules: string[] = [];
  private foreignWildcard = false;
  private readonly globals = new Set<string>();
  private readonly nonlocals = new Set<string>();

  constructor(
    readonly kind: ScopeKind,
    readonly parent: AliasScope | null = null
  ) {}

  child(kind: ScopeKind): AliasScope {
    return new AliasScope(kind, this);
  }

  /** Bind a name, honouring `global` / `nonlocal` declarations. */
  bind(name: string, binding: AliasBinding): void {
    this.owningScope(name).bindings.set(name, binding);
  }

  shadow(name: string): void {
    this.bind(name, { kind: "local" });
  }

  addWildcard(modulePath: string): void {
    this.wildcardModules.push(modulePath);
  }

  /**
   * A wildcard from outside the described package. Names bound by earlier
   * wildcards, and the broad search, no longer have a single origin.
   */
  addForeignWildcard(): void {
    for (const [name, binding] of this.bindings) {
      if (binding.kind === "origin" && binding.via === "wildcard") {
        this.bindings.set(name, { kind: "ambiguous" });
      }
    }
    this.foreignWildcard = true;
  }

  declareGlobal(name: string): void {
    this.globals.add(name);
  }

  declareNonlocal(name: string): void {
    this.nonlocals.add(name);
  }

  /**
   * Resolve a bare name: nearest binding wins; otherwise a wildcard import
   * in a visible scope enables a broad search.
   */
  lookup(name: string): Lookup {
    for (const scope of this.visibleScopes()) {
      const binding = scope.bindings.get(name);
      if (binding) {
        return { kind: "bound", binding };
      }
    }

    const scopes = this.visibleScopes();
    const modules = scopes.flatMap((scope) => scope.wildcardModules);
    if (modules.length > 0) {
      return { kind: "wildcard", modules, foreign: scopes.some((scope) => scope.foreignWildcard) };
    }
    return { kind: "missing" };
  }

  /** This scope, then every enclosing scope except class bodies. */
  private visibleScopes(): AliasScope[] {
    const scopes: AliasScope[] = [this];
    for (let scope = this.parent; scope; scope = scope.parent) {
      if (scope.kind !== "class") {
        scopes.push(scope);
      }
    }
    return scopes;
  }

  private owningScope(name: string): AliasScope {
    if (this.globals.has(name)) {
      return this.root();
    }
    if (this.nonlocals.has(name)) {
      for (let scope = this.parent; scope; scope = scope.parent) {
        if (scope.kind === "function") {
          return scope;
        }
      }
    }
    return this;
  }

  private root(): AliasScope {
    let scope: AliasScope = this;
    while (scope.parent) {
      scope = scope.parent;
    }
    return scope;
  }
}
