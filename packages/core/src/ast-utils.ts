/**
 * Shared AST utility functions for the engine and macro implementations.
 */

import ts from "typescript";

// =============================================================================
// Literal values
// =============================================================================

/** Values a value splice (or `valueToExpression`) can turn into a literal. */
export type LiteralValue = string | number | bigint | boolean | null;

export function isLiteralValue(value: unknown): value is LiteralValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean"
  );
}

/**
 * Convert a compile-time scalar to the literal expression that denotes it.
 * Negative numbers become a prefix minus over the absolute value, the way
 * the parser would have produced them.
 */
export function valueToExpression(
  value: LiteralValue,
  factory: ts.NodeFactory = ts.factory,
): ts.Expression {
  if (value === null) return factory.createNull();
  if (typeof value === "string") return factory.createStringLiteral(value);
  if (typeof value === "boolean") return value ? factory.createTrue() : factory.createFalse();
  if (typeof value === "bigint") {
    return value < 0n
      ? factory.createPrefixUnaryExpression(
          ts.SyntaxKind.MinusToken,
          factory.createBigIntLiteral(`${-value}n`),
        )
      : factory.createBigIntLiteral(`${value}n`);
  }
  return numberToExpression(value, factory);
}

function numberToExpression(value: number, factory: ts.NodeFactory): ts.Expression {
  if (Number.isNaN(value)) return factory.createIdentifier("NaN");
  if (value === Infinity) return factory.createIdentifier("Infinity");
  if (value === -Infinity) {
    return factory.createPrefixUnaryExpression(
      ts.SyntaxKind.MinusToken,
      factory.createIdentifier("Infinity"),
    );
  }
  if (value < 0 || Object.is(value, -0)) {
    return factory.createPrefixUnaryExpression(
      ts.SyntaxKind.MinusToken,
      factory.createNumericLiteral(-value),
    );
  }
  return factory.createNumericLiteral(value);
}

// =============================================================================
// stripPositions: mark AST nodes as synthetic
// =============================================================================

/**
 * Recursively set text ranges to -1 so the printer generates fresh text
 * instead of slicing the file the nodes were parsed from.
 */
export function stripPositions<T extends ts.Node>(node: T): T {
  ts.setTextRange(node, { pos: -1, end: -1 });
  ts.forEachChild(node, (child) => {
    stripPositions(child);
  });
  return node;
}

// =============================================================================
// Parsing and printing
// =============================================================================

export class ParseError extends Error {}

/**
 * Syntax errors the parser attached to a source file.
 */
export function parseDiagnosticsOf(sourceFile: ts.SourceFile): readonly ts.Diagnostic[] {
  if ("parseDiagnostics" in sourceFile && Array.isArray(sourceFile.parseDiagnostics)) {
    return sourceFile.parseDiagnostics;
  }
  return [];
}

function firstParseError(sourceFile: ts.SourceFile): string | undefined {
  const [first] = parseDiagnosticsOf(sourceFile);
  return first ? ts.flattenDiagnosticMessageText(first.messageText, "\n") : undefined;
}

/**
 * Parse a code string into an expression with synthetic positions.
 */
export function parseExpression(code: string, fileName = "__macro_expr__.ts"): ts.Expression {
  const sourceFile = ts.createSourceFile(
    fileName,
    `(\n${code}\n);`,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.TS,
  );

  const error = firstParseError(sourceFile);
  if (error) {
    throw new ParseError(`Failed to parse expression: ${code}: ${error}`);
  }

  const [statement] = sourceFile.statements;
  if (
    sourceFile.statements.length === 1 &&
    ts.isExpressionStatement(statement) &&
    ts.isParenthesizedExpression(statement.expression)
  ) {
    return stripPositions(statement.expression.expression);
  }

  throw new ParseError(`Failed to parse expression: ${code}`);
}

/**
 * Parse a code string into statements with synthetic positions.
 */
export function parseStatements(code: string, fileName = "__macro_stmts__.ts"): ts.Statement[] {
  const sourceFile = ts.createSourceFile(
    fileName,
    code,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.TS,
  );

  const error = firstParseError(sourceFile);
  if (error) {
    throw new ParseError(`Failed to parse statements: ${error}`);
  }

  return sourceFile.statements.map((statement) => stripPositions(statement));
}

let sharedPrinter: ts.Printer | undefined;

export function getPrinter(): ts.Printer {
  return (sharedPrinter ??= ts.createPrinter({ newLine: ts.NewLineKind.LineFeed }));
}

let dummySourceFile: ts.SourceFile | undefined;

export function getDummySourceFile(): ts.SourceFile {
  return (dummySourceFile ??= ts.createSourceFile(
    "__print__.ts",
    "",
    ts.ScriptTarget.Latest,
    false,
    ts.ScriptKind.TS,
  ));
}

/**
 * Print a node. Parsed nodes print with the text of the file they came
 * from, so that file is found from the first positioned node (the node or a
 * descendant) unless given.
 */
export function printNode(node: ts.Node, sourceFile?: ts.SourceFile): string {
  const hint = ts.isSourceFile(node)
    ? ts.EmitHint.SourceFile
    : ts.isExpression(node)
      ? ts.EmitHint.Expression
      : ts.EmitHint.Unspecified;
  return getPrinter().printNode(
    hint,
    node,
    sourceFile ?? sourceFileOf(node) ?? getDummySourceFile(),
  );
}

function sourceFileOf(node: ts.Node): ts.SourceFile | undefined {
  if (node.pos >= 0) {
    for (let current: ts.Node | undefined = node; current; current = current.parent) {
      if (ts.isSourceFile(current)) return current;
    }
  }
  return ts.forEachChild(node, sourceFileOf);
}
