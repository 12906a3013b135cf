/**
 * Expansion Pipeline - source text in, expanded source text out
 *
 * Convenience entry points over the driver, plus an adapter that runs the
 * expansion pass as a `before` transformer of a regular TypeScript emit.
 *
 * @example
 * ```typescript
 * const registry = createRegistry();
 * registerMacros(registry, builtinMacros);
 * const { code, diagnostics } = expandSource(source, registry, { fileName: "app.ts" });
 * ```
 */

import ts from "typescript";
import {
  formatDiagnostic,
  getPrinter,
  type MacroDiagnostic,
  type MacroRegistry,
} from "@shapemacro/core";
import {
  expandUnits,
  expandWithin,
  openRun,
  scriptKindFor,
  type ExpansionOptions,
  type ExpansionRunResult,
  type UnitResult,
} from "./driver.js";

export interface ExpandSourceOptions extends ExpansionOptions {
  /** File name used in locations (default: "input.ts") */
  fileName?: string;
}

export interface ExpandSourceResult {
  /** Printed output; the unchanged input when expansion failed */
  code: string;
  sourceFile: ts.SourceFile;
  failed: boolean;
  expansions: number;
  diagnostics: readonly MacroDiagnostic[];
}

/** Parse source text with parent pointers set, as the driver's scope view needs. */
export function parseUnit(code: string, fileName = "input.ts"): ts.SourceFile {
  return ts.createSourceFile(fileName, code, ts.ScriptTarget.Latest, true, scriptKindFor(fileName));
}

/** Print an expanded unit */
export function printUnit(unit: UnitResult): string {
  return getPrinter().printFile(unit.sourceFile);
}

/**
 * Expand macros in a single source text.
 */
export function expandSource(
  code: string,
  registry: MacroRegistry,
  options: ExpandSourceOptions = {},
): ExpandSourceResult {
  const sourceFile = parseUnit(code, options.fileName);
  const run = expandUnits([sourceFile], registry, options);
  const [unit] = run.units;
  return {
    code: unit.failed ? code : printUnit(unit),
    sourceFile: unit.sourceFile,
    failed: unit.failed,
    expansions: unit.expansions,
    diagnostics: run.diagnostics,
  };
}

/**
 * Expand every non-declaration source file of a program. Files from
 * external libraries are left alone.
 */
export function expandProgram(
  program: ts.Program,
  registry: MacroRegistry,
  options: ExpansionOptions = {},
): ExpansionRunResult {
  const sourceFiles = program
    .getSourceFiles()
    .filter((sf) => !sf.isDeclarationFile && !program.isSourceFileFromExternalLibrary(sf));
  return expandUnits(sourceFiles, registry, options);
}

/** Render every diagnostic of a run, one per line */
export function renderDiagnostics(diagnostics: readonly MacroDiagnostic[]): string[] {
  return diagnostics.map(formatDiagnostic);
}

// ============================================================================
// TransformerFactory adapter
// ============================================================================

export interface MacroTransformer {
  /** Pass as a `before` transformer to `program.emit` */
  readonly factory: ts.TransformerFactory<ts.SourceFile>;
  /** Diagnostics reported so far */
  diagnostics(): readonly MacroDiagnostic[];
  /** Whether any unit failed so far */
  readonly failed: boolean;
  /** End the pass: later configuration reads by macros fail */
  dispose(): void;
}

/**
 * Build a transformer that expands macros during emit. A unit whose
 * expansion fails is emitted unchanged and reported through `diagnostics()`.
 */
export function createMacroTransformer(
  registry: MacroRegistry,
  options: ExpansionOptions = {},
): MacroTransformer {
  const { run, close } = openRun(registry, options);
  let failed = false;

  const factory: ts.TransformerFactory<ts.SourceFile> = () => (sourceFile) => {
    const unit = expandWithin(sourceFile, run);
    failed ||= unit.failed;
    return unit.sourceFile;
  };

  return {
    factory,
    diagnostics: () => run.collector.getAll(),
    get failed() {
      return failed;
    },
    dispose: close,
  };
}
