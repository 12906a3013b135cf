/**
 * Diagnostics System for shapemacro
 *
 * Provides:
 * - Structured error codes (SM1001-SM4999) with an explanation catalog
 * - A single-writer collector that every compilation unit reports through
 * - The `<file>:<line>:<column>: <macroName>: <message>` rendering
 *
 * @example
 * ```typescript
 * const collector = new DiagnosticCollector();
 * collector.report({
 *   code: SM2001.code,
 *   severity: "error",
 *   message: "boom",
 *   macroName: "warn",
 *   span,
 * });
 * collector.render(); // ["app.ts:3:1: warn: boom"]
 * ```
 */

import type { SourceSpan } from "./types.js";

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Registration = "registration",
  Expansion = "expansion",
  Template = "template",
  Configuration = "config",
}

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code */
  readonly code: string;

  /** Default severity */
  readonly severity: "error" | "warning";

  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for docs */
  readonly explanation: string;
}

// ============================================================================
// Error Catalog: Registration (SM1xxx)
// ============================================================================

export const SM1001: DiagnosticDescriptor = {
  code: "SM1001",
  severity: "error",
  category: DiagnosticCategory.Registration,
  messageTemplate: "Macro signature {signature} is already registered{origin}",
  explanation: `Two registrations declared the same name and the same sequence of
parameter shapes. Overlapping signatures are allowed (the earliest registered
wins at a call site), identical ones are not, even when they come from
different libraries.

To fix:
- Remove one of the registrations
- Or give one of them a different parameter shape or name`,
};

export const SM1002: DiagnosticDescriptor = {
  code: "SM1002",
  severity: "error",
  category: DiagnosticCategory.Registration,
  messageTemplate: "Cannot register {signature}: the registry is frozen",
  explanation: `The registry is frozen when an expansion run starts. All macros must be
registered before the first compilation unit is processed.`,
};

export const SM1003: DiagnosticDescriptor = {
  code: "SM1003",
  severity: "error",
  category: DiagnosticCategory.Registration,
  messageTemplate: "Invalid macro declaration '{name}': {reason}",
  explanation: `A function tagged @macro must take the context slot (MacroContext) as its
first parameter, followed by parameters typed with one of:

  Expr            any expression
  LiteralExpr     literal
  LambdaExpr      arrow function or function expression
  CallExpr        call expression
  IdentifierExpr  identifier
  BinaryExpr      binary expression`,
};

// ============================================================================
// Error Catalog: Expansion (SM2xxx)
// ============================================================================

export const SM2001: DiagnosticDescriptor = {
  code: "SM2001",
  severity: "error",
  category: DiagnosticCategory.Expansion,
  messageTemplate: "expansion failed: {reason}",
  explanation: `The macro implementation threw, or returned something other than an
expression, a statement or EMPTY. The compilation unit is excluded from later
phases; other units continue.`,
};

export const SM2002: DiagnosticDescriptor = {
  code: "SM2002",
  severity: "error",
  category: DiagnosticCategory.Expansion,
  messageTemplate: "expansion depth exceeded the limit of {limit}",
  explanation: `Macro output is rescanned for further macro calls. A macro whose output
calls itself (directly or through another macro) would never stop, so the
number of nested expansions is bounded by maxExpansionDepth.`,
};

export const SM2003: DiagnosticDescriptor = {
  code: "SM2003",
  severity: "warning",
  category: DiagnosticCategory.Expansion,
  messageTemplate: "{message}",
  explanation: `A warning reported by a macro implementation through ctx.reportWarning().`,
};

// ============================================================================
// Error Catalog: Templates (SM3xxx)
// ============================================================================

export const SM3001: DiagnosticDescriptor = {
  code: "SM3001",
  severity: "error",
  category: DiagnosticCategory.Template,
  messageTemplate: "unbound template hole(s): {holes}",
  explanation: `Every hole of a template ($name for an expression splice, $$name for a
value splice) must be bound when the template is materialized.`,
};

export const SM3002: DiagnosticDescriptor = {
  code: "SM3002",
  severity: "error",
  category: DiagnosticCategory.Template,
  messageTemplate: "invalid template: {reason}",
  explanation: `The template source did not parse, or used one hole name both as an
expression splice and as a value splice.`,
};

// ============================================================================
// Error Catalog: Configuration (SM4xxx)
// ============================================================================

export const SM4001: DiagnosticDescriptor = {
  code: "SM4001",
  severity: "error",
  category: DiagnosticCategory.Configuration,
  messageTemplate: "compile-time configuration read outside the expansion pass ({path})",
  explanation: `Compile-time configuration exists only while macros are being expanded.
A macro that keeps its context and reads configuration later fails here.`,
};

export const DIAGNOSTIC_CATALOG: ReadonlyMap<string, DiagnosticDescriptor> = new Map(
  [SM1001, SM1002, SM1003, SM2001, SM2002, SM2003, SM3001, SM3002, SM4001].map(
    (d) => [d.code, d] as const,
  ),
);

export function getDiagnosticDescriptor(code: string): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

/**
 * Interpolate `{placeholders}` of a descriptor's message template.
 */
export function formatMessage(
  descriptor: DiagnosticDescriptor,
  args: Record<string, string | number | undefined>,
): string {
  let message = descriptor.messageTemplate;
  for (const [key, value] of Object.entries(args)) {
    message = message.replace(
      new RegExp(`\\{${key}\\}`, "g"),
      value === undefined ? "" : String(value),
    );
  }
  return message;
}

// ============================================================================
// Macro Diagnostics
// ============================================================================

export interface MacroDiagnostic {
  code: string;
  severity: "error" | "warning";
  message: string;
  macroName?: string;
  span?: SourceSpan;
  /** Compilation unit the diagnostic belongs to */
  unit?: string;
}

/**
 * Render `<file>:<line>:<column>: <macroName>: <message>`. Missing parts
 * fall back to the unit name and `shapemacro`.
 */
export function formatDiagnostic(diagnostic: MacroDiagnostic): string {
  const where = diagnostic.span
    ? `${diagnostic.span.file}:${diagnostic.span.startLine}:${diagnostic.span.startColumn}`
    : (diagnostic.unit ?? "<unknown>");
  return `${where}: ${diagnostic.macroName ?? "shapemacro"}: ${diagnostic.message}`;
}

/**
 * Collects diagnostics from every compilation unit of a run. Units report
 * through one collector so output is never interleaved.
 */
export class DiagnosticCollector {
  private readonly diagnostics: MacroDiagnostic[] = [];

  report(diagnostic: MacroDiagnostic): void {
    this.diagnostics.push(Object.freeze({ ...diagnostic }));
  }

  getAll(): readonly MacroDiagnostic[] {
    return [...this.diagnostics];
  }

  forUnit(unit: string): readonly MacroDiagnostic[] {
    return this.diagnostics.filter((d) => d.unit === unit);
  }

  get errorCount(): number {
    return this.diagnostics.filter((d) => d.severity === "error").length;
  }

  hasErrors(): boolean {
    return this.errorCount > 0;
  }

  render(): string[] {
    return this.diagnostics.map(formatDiagnostic);
  }
}
