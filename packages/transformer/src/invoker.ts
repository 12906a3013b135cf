/**
 * Expansion Invoker - runs one matched macro against one call site
 */

import ts from "typescript";
import {
  EMPTY,
  MacroError,
  MacroExecutionError,
  ScopeView,
  createMacroContext,
  isNode,
  type CallSite,
  type CompileTimeConfig,
  type LocationTable,
  type MacroDefinition,
  type MacroDiagnostic,
  type ReplacementResult,
} from "@shapemacro/core";

export interface InvocationEnvironment {
  config: CompileTimeConfig;
  locations: LocationTable;
  factory?: ts.NodeFactory;
  /** Node whose enclosing scope the macro sees (default: the call itself) */
  scopeAnchor?: ts.Node;
  report?: (diagnostic: MacroDiagnostic) => void;
}

function isReplacementResult(value: unknown): value is ReplacementResult {
  return value === EMPTY || (isNode(value) && (ts.isExpression(value) || ts.isStatement(value)));
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}

/**
 * Run a macro with the raw argument nodes of its call site. Errors the
 * implementation throws are reported against the call site; anything that
 * is not a MacroError becomes a MacroExecutionError.
 */
export function invokeMacro(
  definition: MacroDefinition,
  callSite: CallSite,
  environment: InvocationEnvironment,
): ReplacementResult {
  const macroName = definition.signature.name;
  const ctx = createMacroContext({
    macroName,
    span: callSite.span,
    scope: new ScopeView(environment.scopeAnchor ?? callSite.node),
    config: environment.config,
    locations: environment.locations,
    factory: environment.factory,
    report: environment.report,
  });

  let result: unknown;
  try {
    result = definition.expand(ctx, callSite.args);
  } catch (error) {
    if (error instanceof MacroError) {
      throw error.attachCallSite(macroName, callSite.span);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new MacroExecutionError(macroName, callSite.span, reason, error);
  }

  if (!isReplacementResult(result)) {
    throw new MacroExecutionError(
      macroName,
      callSite.span,
      `returned ${describeValue(result)}; expected an expression, a statement or EMPTY`,
    );
  }
  return result;
}
