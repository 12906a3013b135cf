/**
 * MacroContext Implementation - Provides utilities for macro expansion
 */

import ts from "typescript";
import { parseExpression, valueToExpression } from "./ast-utils.js";
import { SM2003, type MacroDiagnostic } from "./diagnostics.js";
import { formatLocation, type LocationTable } from "./location.js";
import { EMPTY_SCOPE } from "./scope.js";
import type { CompileTimeConfig, MacroContext, ScopeLookup, SourceSpan } from "./types.js";

export interface MacroContextInit {
  macroName: string;
  span: SourceSpan | undefined;
  scope?: ScopeLookup;
  config: CompileTimeConfig;
  locations: LocationTable;
  factory?: ts.NodeFactory;
  /** Receives warnings reported by the macro */
  report?: (diagnostic: MacroDiagnostic) => void;
}

export class MacroContextImpl implements MacroContext {
  readonly macroName: string;
  readonly span: SourceSpan | undefined;
  readonly scope: ScopeLookup;
  readonly config: CompileTimeConfig;
  readonly factory: ts.NodeFactory;

  private readonly locations: LocationTable;
  private readonly report: ((diagnostic: MacroDiagnostic) => void) | undefined;

  constructor(init: MacroContextInit) {
    this.macroName = init.macroName;
    this.span = init.span;
    this.scope = init.scope ?? EMPTY_SCOPE;
    this.config = init.config;
    this.factory = init.factory ?? ts.factory;
    this.locations = init.locations;
    this.report = init.report;
  }

  get locationString(): string {
    return formatLocation(this.span);
  }

  // -------------------------------------------------------------------------
  // Node Creation Utilities
  // -------------------------------------------------------------------------

  createIdentifier(name: string): ts.Identifier {
    return this.factory.createIdentifier(name);
  }

  createStringLiteral(value: string): ts.StringLiteral {
    return this.factory.createStringLiteral(value);
  }

  createNumericLiteral(value: number): ts.Expression {
    return valueToExpression(value, this.factory);
  }

  createBooleanLiteral(value: boolean): ts.Expression {
    return value ? this.factory.createTrue() : this.factory.createFalse();
  }

  parseExpression(code: string): ts.Expression {
    return parseExpression(code);
  }

  // -------------------------------------------------------------------------
  // Locations and Diagnostics
  // -------------------------------------------------------------------------

  synthetic<T extends ts.Node>(node: T): T {
    return this.locations.markSynthetic(node);
  }

  reportWarning(message: string): void {
    this.report?.({
      code: SM2003.code,
      severity: "warning",
      message,
      macroName: this.macroName,
      span: this.span,
    });
  }
}

export function createMacroContext(init: MacroContextInit): MacroContext {
  return new MacroContextImpl(init);
}
