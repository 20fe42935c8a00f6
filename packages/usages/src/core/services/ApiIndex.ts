import type { ApiDescription, ApiElement } from "../model.js";

const MAX_ALIAS_HOPS = 16;

const CALLABLE_KINDS = new Set(["function", "method"]);
const TOP_LEVEL_KINDS = new Set(["function", "class"]);

/**
 * Read-only lookup structure over an API description.
 * Shared by every file analysis of a run; never mutated after construction.
 */
export class ApiIndex {
  readonly package: string;
  readonly version: string | undefined;

  private readonly elements = new Map<string, ApiElement>();
  private readonly byBareName = new Map<string, ApiElement[]>();
  private readonly byParent = new Map<string, ApiElement[]>();
  private readonly aliases: Map<string, string>;
  private readonly roots = new Set<string>();

  constructor(description: ApiDescription) {
    this.package = description.package;
    this.version = description.version;
    this.aliases = new Map(Object.entries(description.aliases));
    this.roots.add(rootOf(description.package));

    for (const element of description.elements) {
      this.elements.set(element.qname, element);
      this.roots.add(rootOf(element.qname));

      if (TOP_LEVEL_KINDS.has(element.kind)) {
        const bare = bareName(element.qname);
        const sameName = this.byBareName.get(bare) ?? [];
        sameName.push(element);
        this.byBareName.set(bare, sameName);

        const parent = parentOf(element.qname);
        const siblings = this.byParent.get(parent) ?? [];
        siblings.push(element);
        this.byParent.set(parent, siblings);
      }
    }
  }

  get(qname: string): ApiElement | undefined {
    return this.elements.get(qname);
  }

  all(): ApiElement[] {
    return Array.from(this.elements.values());
  }

  callables(): ApiElement[] {
    return this.all().filter((e) => CALLABLE_KINDS.has(e.kind));
  }

  classes(): ApiElement[] {
    return this.all().filter((e) => e.kind === "class");
  }

  /** Top-level package names, e.g. "sklearn". */
  packageRoots(): string[] {
    return Array.from(this.roots);
  }

  /** Whether a dotted path lives inside the described package. */
  belongsToPackage(path: string): boolean {
    return this.roots.has(rootOf(path));
  }

  /**
   * Rewrite a path through the re-export table, longest prefix first,
   * until no alias applies.
   */
  canonicalize(path: string): string {
    let current = path;
    for (let hop = 0; hop < MAX_ALIAS_HOPS; hop++) {
      const next = this.applyAlias(current);
      if (next === current) {
        return current;
      }
      current = next;
    }
    return current;
  }

  /**
   * Constructor element for a class: `__init__`, else `__new__`.
   */
  constructorOf(classQname: string): ApiElement | undefined {
    return this.get(`${classQname}.__init__`) ?? this.get(`${classQname}.__new__`);
  }

  /** Functions and classes defined directly in a module. */
  membersOf(modulePath: string): ApiElement[] {
    return this.byParent.get(this.canonicalize(modulePath)) ?? [];
  }

  /** Names a wildcard import of the module binds: its members plus re-exports. */
  exportsOf(modulePath: string): Array<{ name: string; path: string }> {
    const module = this.canonicalize(modulePath);
    const exports = this.membersOf(module).map((e) => ({ name: bareName(e.qname), path: e.qname }));
    for (const alias of this.aliases.keys()) {
      if (parentOf(alias) === modulePath || parentOf(alias) === module) {
        exports.push({ name: bareName(alias), path: alias });
      }
    }
    return exports;
  }

  /** Functions and classes with the given unqualified name anywhere in the package. */
  findByBareName(name: string): ApiElement[] {
    return this.byBareName.get(name) ?? [];
  }

  private applyAlias(path: string): string {
    const segments = path.split(".");
    for (let length = segments.length; length > 0; length--) {
      const prefix = segments.slice(0, length).join(".");
      const target = this.aliases.get(prefix);
      if (target !== undefined && target !== prefix) {
        return [target, ...segments.slice(length)].join(".");
      }
    }
    return path;
  }
}

export function bareName(qname: string): string {
  const dot = qname.lastIndexOf(".");
  return dot === -1 ? qname : qname.slice(dot + 1);
}

export function parentOf(qname: string): string {
  const dot = qname.lastIndexOf(".");
  return dot === -1 ? "" : qname.slice(0, dot);
}

function rootOf(path: string): string {
  const dot = path.indexOf(".");
  return dot === -1 ? path : path.slice(0, dot);
}
