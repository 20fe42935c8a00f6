/**
 * Applies Python import statements to an alias scope.
 */
import type Parser from "tree-sitter";

import type { ApiIndex } from "../../core/services/ApiIndex.js";
import type { AliasScope } from "./AliasScope.js";

function significantChildren(node: Parser.SyntaxNode): Parser.SyntaxNode[] {
  return node.namedChildren.filter((c) => c.type !== "comment");
}

/**
 * `import a.b.c` binds `a`; `import a.b as x` binds `x` to `a.b`.
 */
export function applyImport(node: Parser.SyntaxNode, scope: AliasScope): void {
  for (const child of significantChildren(node)) {
    if (child.type === "dotted_name") {
      const root = child.text.split(".")[0].trim();
      scope.bind(root, { kind: "origin", origin: root, via: "import" });
    } else if (child.type === "aliased_import") {
      const name = child.childForFieldName("name");
      const alias = child.childForFieldName("alias");
      if (name && alias) {
        scope.bind(alias.text, { kind: "origin", origin: normalizeDotted(name.text), via: "import" });
      }
    }
  }
}

/**
 * `from X import Y as Z` binds `Z` to `X.Y`. Relative imports name client
 * modules, so their names only shadow. A wildcard from the described package
 * binds every known member and enables the broad search for the rest; one
 * from elsewhere makes those names ambiguous.
 */
export function applyFromImport(node: Parser.SyntaxNode, scope: AliasScope, api: ApiIndex): void {
  const [moduleNode, ...names] = significantChildren(node);
  if (!moduleNode) {
    return;
  }

  const relative = moduleNode.type === "relative_import";
  const modulePath = normalizeDotted(moduleNode.text);

  for (const child of names) {
    if (child.type === "wildcard_import") {
      if (!relative && api.belongsToPackage(modulePath)) {
        for (const exported of api.exportsOf(modulePath)) {
          scope.bind(exported.name, { kind: "origin", origin: exported.path, via: "wildcard" });
        }
        scope.addWildcard(modulePath);
      } else if (!relative) {
        scope.addForeignWildcard();
      }
      continue;
    }

    let imported: Parser.SyntaxNode | null = null;
    let local: string | null = null;
    if (child.type === "dotted_name") {
      imported = child;
      local = child.text;
    } else if (child.type === "aliased_import") {
      imported = child.childForFieldName("name");
      local = child.childForFieldName("alias")?.text ?? null;
    }
    if (!imported || !local) {
      continue;
    }

    if (relative) {
      scope.shadow(local);
    } else {
      scope.bind(local, {
        kind: "origin",
        origin: `${modulePath}.${normalizeDotted(imported.text)}`,
        via: "from-import",
      });
    }
  }
}

function normalizeDotted(text: string): string {
  return text.replace(/\s+/g, "");
}
