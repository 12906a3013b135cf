/**
 * Structural classification of argument syntax.
 *
 * `classifyExpression` is the only place that maps syntax kinds to shapes;
 * matching never looks at anything but its result.
 */

import ts from "typescript";
import type { ExpressionShape, ParameterShape } from "./types.js";

export const PARAMETER_SHAPES: readonly ParameterShape[] = [
  "any",
  "literal",
  "identifier",
  "lambda",
  "call",
  "binary",
  "unary",
  "member",
  "object",
  "array",
  "conditional",
];

export function isParameterShape(value: string): value is ParameterShape {
  return PARAMETER_SHAPES.some((shape) => shape === value);
}

export function classifyExpression(node: ts.Expression): ExpressionShape {
  switch (node.kind) {
    case ts.SyntaxKind.StringLiteral:
    case ts.SyntaxKind.NumericLiteral:
    case ts.SyntaxKind.BigIntLiteral:
    case ts.SyntaxKind.NoSubstitutionTemplateLiteral:
    case ts.SyntaxKind.RegularExpressionLiteral:
    case ts.SyntaxKind.TrueKeyword:
    case ts.SyntaxKind.FalseKeyword:
    case ts.SyntaxKind.NullKeyword:
      return "literal";

    case ts.SyntaxKind.Identifier:
      return "identifier";

    case ts.SyntaxKind.ArrowFunction:
    case ts.SyntaxKind.FunctionExpression:
      return "lambda";

    case ts.SyntaxKind.CallExpression:
      return "call";

    case ts.SyntaxKind.BinaryExpression:
      return "binary";

    case ts.SyntaxKind.PrefixUnaryExpression:
    case ts.SyntaxKind.PostfixUnaryExpression:
      return "unary";

    case ts.SyntaxKind.PropertyAccessExpression:
    case ts.SyntaxKind.ElementAccessExpression:
      return "member";

    case ts.SyntaxKind.ObjectLiteralExpression:
      return "object";

    case ts.SyntaxKind.ArrayLiteralExpression:
      return "array";

    case ts.SyntaxKind.ConditionalExpression:
      return "conditional";

    default:
      return "other";
  }
}

/**
 * Whether a declared shape accepts an argument. `"any"` accepts everything;
 * every other shape requires exact equality, with no widening.
 */
export function shapeAccepts(declared: ParameterShape, actual: ExpressionShape): boolean {
  return declared === "any" || declared === actual;
}
