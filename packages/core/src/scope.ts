/**
 * Enclosing-scope view handed to macros. It holds the call site only weakly
 * and offers lookups, never mutation.
 */

import ts from "typescript";
import type { ScopeLookup } from "./types.js";

export class ScopeView implements ScopeLookup {
  private readonly anchor: WeakRef<ts.Node> | undefined;

  constructor(anchor: ts.Node | undefined) {
    this.anchor = anchor ? new WeakRef(anchor) : undefined;
  }

  lookup(name: string): ts.Declaration | undefined {
    let current = this.anchor?.deref();
    while (current) {
      const found = declarationsIn(current).find((entry) => entry.name === name);
      if (found) return found.declaration;
      current = current.parent;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }
}

/** A scope view that finds nothing, for synthetic call sites. */
export const EMPTY_SCOPE: ScopeLookup = Object.freeze({
  lookup: () => undefined,
  has: () => false,
});

interface NamedDeclaration {
  name: string;
  declaration: ts.Declaration;
}

function declarationsIn(node: ts.Node): NamedDeclaration[] {
  if (ts.isSourceFile(node) || ts.isBlock(node) || ts.isModuleBlock(node)) {
    return node.statements.flatMap(declarationsOfStatement);
  }
  if (ts.isCaseClause(node) || ts.isDefaultClause(node)) {
    return node.statements.flatMap(declarationsOfStatement);
  }
  if (ts.isFunctionLike(node)) {
    const own: NamedDeclaration[] =
      ts.isFunctionExpression(node) && node.name
        ? [{ name: node.name.text, declaration: node }]
        : [];
    return [...own, ...node.parameters.flatMap((p) => bindingNames(p.name, p))];
  }
  if (ts.isForStatement(node) || ts.isForInStatement(node) || ts.isForOfStatement(node)) {
    const init = node.initializer;
    return init && ts.isVariableDeclarationList(init) ? declarationsOfList(init) : [];
  }
  if (ts.isCatchClause(node) && node.variableDeclaration) {
    return bindingNames(node.variableDeclaration.name, node.variableDeclaration);
  }
  return [];
}

function declarationsOfStatement(statement: ts.Statement): NamedDeclaration[] {
  if (ts.isVariableStatement(statement)) {
    return declarationsOfList(statement.declarationList);
  }
  if (
    (ts.isFunctionDeclaration(statement) ||
      ts.isClassDeclaration(statement) ||
      ts.isEnumDeclaration(statement)) &&
    statement.name
  ) {
    return [{ name: statement.name.text, declaration: statement }];
  }
  if (ts.isImportDeclaration(statement) && statement.importClause) {
    return importedNames(statement.importClause);
  }
  return [];
}

function declarationsOfList(list: ts.VariableDeclarationList): NamedDeclaration[] {
  return list.declarations.flatMap((d) => bindingNames(d.name, d));
}

function bindingNames(name: ts.BindingName, declaration: ts.Declaration): NamedDeclaration[] {
  if (ts.isIdentifier(name)) {
    return [{ name: name.text, declaration }];
  }
  return name.elements.flatMap((element) =>
    ts.isOmittedExpression(element) ? [] : bindingNames(element.name, element),
  );
}

function importedNames(clause: ts.ImportClause): NamedDeclaration[] {
  const names: NamedDeclaration[] = [];
  if (clause.name) {
    names.push({ name: clause.name.text, declaration: clause });
  }
  const bindings = clause.namedBindings;
  if (bindings && ts.isNamespaceImport(bindings)) {
    names.push({ name: bindings.name.text, declaration: bindings });
  } else if (bindings) {
    for (const element of bindings.elements) {
      names.push({ name: element.name.text, declaration: element });
    }
  }
  return names;
}
