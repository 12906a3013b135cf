/**
 * Template Engine
 *
 * A template is code with named holes:
 *
 * - `$name`  ExpressionSplice: the bound subtree is embedded as-is
 * - `$$name` ValueSplice: the bound scalar becomes a literal node
 *
 * ```typescript
 * const warning = parseTemplate(`!($cond) && println($$location + ": " + $msg)`);
 * const node = materialize(warning, { cond, msg }, { location: ctx.locationString });
 * ```
 *
 * Parsing checks the holes once; every materialization re-parses the source
 * so no two results share nodes (the driver assigns locations per node).
 */

import ts from "typescript";
import {
  ParseError,
  TemplateSyntaxError,
  UnresolvedHoleError,
  parseExpression,
  parseStatements,
  valueToExpression,
  type LiteralValue,
} from "@shapemacro/core";

export type TemplateKind = "expression" | "statements";
export type HoleKind = "expression" | "value";

export interface Template<K extends TemplateKind = TemplateKind> {
  readonly kind: K;
  readonly source: string;
  /** Hole name → kind, in order of first appearance */
  readonly holes: ReadonlyMap<string, HoleKind>;
}

export type ExpressionBindings = Readonly<Record<string, ts.Expression>>;
export type ValueBindings = Readonly<Record<string, LiteralValue>>;

const HOLE_PATTERN = /^(\$\$?)([A-Za-z_]\w*)$/;
const TEMPLATE_FILE = "__template__.ts";

interface Hole {
  name: string;
  kind: HoleKind;
}

function readHole(node: ts.Identifier): Hole | undefined {
  const match = HOLE_PATTERN.exec(node.text);
  if (!match) return undefined;
  return { name: match[2], kind: match[1] === "$$" ? "value" : "expression" };
}

// =============================================================================
// Parsing
// =============================================================================

function parseSource(source: string, kind: TemplateKind): ts.Node[] {
  try {
    return kind === "expression"
      ? [parseExpression(source, TEMPLATE_FILE)]
      : parseStatements(source, TEMPLATE_FILE);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new TemplateSyntaxError(error.message);
    }
    throw error;
  }
}

/**
 * Whether an identifier is read as an expression. Holes may only stand
 * where an expression can: not as a property name, declaration name,
 * label or type.
 */
function isExpressionPosition(node: ts.Identifier): boolean {
  const parent = node.parent;
  if (ts.isPropertyAccessExpression(parent)) return parent.expression === node;
  if (ts.isShorthandPropertyAssignment(parent)) return false;
  if (ts.isBindingElement(parent)) return parent.initializer === node;
  if (
    ts.isLabeledStatement(parent) ||
    ts.isBreakStatement(parent) ||
    ts.isContinueStatement(parent)
  ) {
    return false;
  }
  if (ts.isTypeNode(parent) || ts.isQualifiedName(parent)) return false;
  if ("name" in parent && parent.name === node) return false;
  return true;
}

function collectHoles(roots: readonly ts.Node[]): Map<string, HoleKind> {
  const holes = new Map<string, HoleKind>();

  const visit = (node: ts.Node): void => {
    if (ts.isIdentifier(node)) {
      const hole = readHole(node);
      if (hole) {
        if (!isExpressionPosition(node)) {
          throw new TemplateSyntaxError(`hole '${node.text}' is not in an expression position`);
        }
        const seen = holes.get(hole.name);
        if (seen && seen !== hole.kind) {
          throw new TemplateSyntaxError(
            `'${hole.name}' is used as both an expression and a value hole`,
          );
        }
        holes.set(hole.name, hole.kind);
      }
    }
    ts.forEachChild(node, visit);
  };

  roots.forEach(visit);
  return holes;
}

/**
 * Parse template source into a template. The source is parsed once here to
 * validate it and find its holes.
 */
export function parseTemplate(source: string): Template<"expression">;
export function parseTemplate<K extends TemplateKind>(
  source: string,
  options: { kind: K },
): Template<K>;
export function parseTemplate(
  source: string,
  options: { kind: TemplateKind } = { kind: "expression" },
): Template {
  const holes = collectHoles(parseSource(source, options.kind));
  return Object.freeze({ kind: options.kind, source, holes });
}

// =============================================================================
// Materialization
// =============================================================================

/** Kinds that can stand as an operand or callee without parentheses. */
const OPERAND_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.Identifier,
  ts.SyntaxKind.StringLiteral,
  ts.SyntaxKind.NumericLiteral,
  ts.SyntaxKind.BigIntLiteral,
  ts.SyntaxKind.NoSubstitutionTemplateLiteral,
  ts.SyntaxKind.RegularExpressionLiteral,
  ts.SyntaxKind.TemplateExpression,
  ts.SyntaxKind.TrueKeyword,
  ts.SyntaxKind.FalseKeyword,
  ts.SyntaxKind.NullKeyword,
  ts.SyntaxKind.ThisKeyword,
  ts.SyntaxKind.SuperKeyword,
  ts.SyntaxKind.CallExpression,
  ts.SyntaxKind.NewExpression,
  ts.SyntaxKind.PropertyAccessExpression,
  ts.SyntaxKind.ElementAccessExpression,
  ts.SyntaxKind.TaggedTemplateExpression,
  ts.SyntaxKind.ParenthesizedExpression,
  ts.SyntaxKind.ArrayLiteralExpression,
  ts.SyntaxKind.ObjectLiteralExpression,
  ts.SyntaxKind.NonNullExpression,
]);

/**
 * Holes that are the operand of a unary operator, or the object or callee
 * of an access or call. A replacement there must be parenthesized unless it
 * is already an operand.
 */
function isOperandPosition(node: ts.Identifier): boolean {
  const parent = node.parent;
  if (ts.isPropertyAccessExpression(parent) || ts.isElementAccessExpression(parent)) {
    return parent.expression === node;
  }
  if (ts.isCallExpression(parent) || ts.isNewExpression(parent)) {
    return parent.expression === node;
  }
  if (ts.isTaggedTemplateExpression(parent)) return parent.tag === node;
  return (
    ts.isPrefixUnaryExpression(parent) ||
    ts.isPostfixUnaryExpression(parent) ||
    ts.isNonNullExpression(parent) ||
    ts.isDeleteExpression(parent) ||
    ts.isTypeOfExpression(parent) ||
    ts.isVoidExpression(parent) ||
    ts.isAwaitExpression(parent)
  );
}

function unboundHoles(
  template: Template,
  expressions: ExpressionBindings,
  values: ValueBindings,
): string[] {
  return [...template.holes]
    .filter(([name, kind]) => !Object.hasOwn(kind === "expression" ? expressions : values, name))
    .map(([name, kind]) => (kind === "expression" ? `$${name}` : `$$${name}`))
    .sort();
}

function substitute<T extends ts.Node>(
  roots: readonly T[],
  test: (node: ts.Node) => node is T,
  expressions: ExpressionBindings,
  values: ValueBindings,
  factory: ts.NodeFactory,
): T[] {
  const result = ts.transform<T>(
    [...roots],
    [
      (context) => {
        const fill = (node: ts.Identifier, hole: Hole): ts.Expression => {
          const replacement =
            hole.kind === "expression"
              ? expressions[hole.name]
              : valueToExpression(values[hole.name], factory);
          return isOperandPosition(node) && !OPERAND_KINDS.has(replacement.kind)
            ? factory.createParenthesizedExpression(replacement)
            : replacement;
        };
        const visit = (node: ts.Node): ts.Node => {
          if (ts.isIdentifier(node)) {
            const hole = readHole(node);
            if (hole) return fill(node, hole);
          }
          return ts.visitEachChild(node, visit, context);
        };
        return (root) => ts.visitNode(root, visit, test);
      },
    ],
  );
  const transformed = [...result.transformed];
  result.dispose();
  return transformed;
}

/**
 * Fill every hole of a template. Expression holes embed the bound node
 * itself; value holes become literal nodes. Nothing is evaluated.
 *
 * @throws UnresolvedHoleError listing every hole without a binding
 */
export function materialize(
  template: Template<"expression">,
  expressions?: ExpressionBindings,
  values?: ValueBindings,
  factory?: ts.NodeFactory,
): ts.Expression;
export function materialize(
  template: Template<"statements">,
  expressions?: ExpressionBindings,
  values?: ValueBindings,
  factory?: ts.NodeFactory,
): ts.Statement[];
export function materialize(
  template: Template,
  expressions?: ExpressionBindings,
  values?: ValueBindings,
  factory?: ts.NodeFactory,
): ts.Expression | ts.Statement[];
export function materialize(
  template: Template,
  expressions: ExpressionBindings = {},
  values: ValueBindings = {},
  factory: ts.NodeFactory = ts.factory,
): ts.Expression | ts.Statement[] {
  const missing = unboundHoles(template, expressions, values);
  if (missing.length > 0) {
    throw new UnresolvedHoleError(missing);
  }

  if (template.kind === "expression") {
    const root = parseExpression(template.source, TEMPLATE_FILE);
    const [expression] = substitute([root], ts.isExpression, expressions, values, factory);
    return expression;
  }
  const statements = parseStatements(template.source, TEMPLATE_FILE);
  return substitute(statements, ts.isStatement, expressions, values, factory);
}
