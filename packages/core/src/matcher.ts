/**
 * Call-Site Matcher
 *
 * Decides which registered macro, if any, a call expression invokes. Only
 * the callee name, the argument count and each argument's shape take part;
 * types and runtime values never do.
 */

import ts from "typescript";
import type { LocationTable } from "./location.js";
import { classifyExpression, shapeAccepts } from "./shapes.js";
import type { CallSite, ExpressionShape, MacroDefinition } from "./types.js";

export interface MatchRejection {
  readonly definition: MacroDefinition;
  readonly reason: "arity" | "shape";
  /** Argument index of the first shape mismatch */
  readonly position?: number;
  readonly expected?: string;
  readonly actual?: ExpressionShape | number;
}

export type MatchResult =
  | { readonly kind: "matched"; readonly definition: MacroDefinition }
  | { readonly kind: "no-match"; readonly rejections: readonly MatchRejection[] };

/**
 * Build a call site for a call whose callee is a plain identifier. Member
 * calls, optional calls, calls with type arguments and calls with a spread
 * argument (whose arity is only known at run time) are never macro calls.
 */
export function toCallSite(
  node: ts.CallExpression,
  locations?: LocationTable,
): CallSite | undefined {
  if (!ts.isIdentifier(node.expression)) return undefined;
  if (node.questionDotToken || node.typeArguments) return undefined;
  if (node.arguments.some(ts.isSpreadElement)) return undefined;

  return {
    callee: node.expression.text,
    args: [...node.arguments],
    span: locations?.locate(node),
    node,
  };
}

/**
 * Match a call site against candidates. Candidates are tried in
 * registration order and the first structural match wins; running out of
 * candidates is a normal result, not an error.
 */
export function matchCallSite(
  callSite: CallSite,
  candidates: readonly MacroDefinition[],
): MatchResult {
  const rejections: MatchRejection[] = [];
  const argShapes = callSite.args.map(classifyExpression);

  const ordered = candidates
    .filter((def) => def.signature.name === callSite.callee)
    .sort((a, b) => a.order - b.order);

  for (const definition of ordered) {
    const params = definition.signature.params;

    if (params.length !== argShapes.length) {
      rejections.push({
        definition,
        reason: "arity",
        expected: String(params.length),
        actual: argShapes.length,
      });
      continue;
    }

    const mismatch = params.findIndex((shape, i) => !shapeAccepts(shape, argShapes[i]));
    if (mismatch >= 0) {
      rejections.push({
        definition,
        reason: "shape",
        position: mismatch,
        expected: params[mismatch],
        actual: argShapes[mismatch],
      });
      continue;
    }

    return { kind: "matched", definition };
  }

  return { kind: "no-match", rejections };
}

/** One-line explanation of a rejection, for verbose logs. */
export function describeRejection(rejection: MatchRejection): string {
  const { name, params } = rejection.definition.signature;
  const signature = `${name}(${params.join(", ")})`;
  if (rejection.reason === "arity") {
    return `${signature}: expected ${rejection.expected} argument(s), got ${rejection.actual}`;
  }
  const position = (rejection.position ?? 0) + 1;
  const { actual, expected } = rejection;
  return `${signature}: argument ${position} is ${actual}, expected ${expected}`;
}
