/**
 * Global Transformation Driver
 *
 * One depth-first pass per compilation unit. Every call node is offered to
 * the matcher; a matched call is replaced by what its macro returns, and the
 * replacement is scanned again one level deeper so macros can expand to
 * other macro calls.
 *
 * The pass is `(unit, frozen registry) -> (unit, diagnostics)`: the registry
 * and the compile-time configuration are passed in, never read from module
 * state.
 */

import ts from "typescript";
import {
  DEFAULT_MAX_EXPANSION_DEPTH,
  DiagnosticCollector,
  EMPTY,
  LocationTable,
  MacroError,
  MacroExecutionError,
  RecursionLimitError,
  SM2001,
  createConfigStore,
  describeRejection,
  describeSignature,
  formatLocation,
  formatMessage,
  matchCallSite,
  openConfigWindow,
  toCallSite,
  type CallSite,
  type CompileTimeConfig,
  type ConfigRecord,
  type ConfigStore,
  type MacroDefinition,
  type MacroDiagnostic,
  type MacroRegistry,
  type ReplacementResult,
} from "@shapemacro/core";
import { invokeMacro } from "./invoker.js";

export interface ExpansionOptions {
  /** Maximum nesting of expansions (default: `maxExpansionDepth` from config, then 64) */
  maxExpansionDepth?: number;

  /** Log matching and expansion to the console */
  verbose?: boolean;

  /**
   * Compile-time configuration: a store, or plain values. Defaults to a
   * store built from config files and SHAPEMACRO_* variables.
   */
  config?: ConfigStore | Readonly<ConfigRecord>;

  /** Location table shared with the caller (default: a fresh table) */
  locations?: LocationTable;
}

export interface UnitResult {
  readonly fileName: string;
  /** The expanded unit, or the original one when the unit failed */
  readonly sourceFile: ts.SourceFile;
  readonly failed: boolean;
  readonly expansions: number;
  readonly diagnostics: readonly MacroDiagnostic[];
}

export interface ExpansionRunResult {
  readonly units: readonly UnitResult[];
  readonly diagnostics: readonly MacroDiagnostic[];
  readonly failed: boolean;
}

/** Process exit code for a run: 1 when any unit failed */
export function exitCodeFor(run: ExpansionRunResult): 0 | 1 {
  return run.units.some((unit) => unit.failed) ? 1 : 0;
}

// ============================================================================
// Run state
// ============================================================================

/** State shared by every unit of one run. */
export interface ExpansionRun {
  readonly registry: MacroRegistry;
  readonly config: CompileTimeConfig;
  readonly locations: LocationTable;
  readonly collector: DiagnosticCollector;
  readonly maxDepth: number;
  readonly verbose: boolean;
}

export interface OpenRun {
  readonly run: ExpansionRun;
  /** Revoke the configuration capability */
  close(): void;
}

function isConfigStore(value: ConfigStore | Readonly<ConfigRecord>): value is ConfigStore {
  return typeof value.getAll === "function" && typeof value.getConfigFilePath === "function";
}

/**
 * Freeze the registry and open the compile-time window for a run. The
 * caller must `close()` it when the pass is over.
 */
export function openRun(registry: MacroRegistry, options: ExpansionOptions = {}): OpenRun {
  registry.freeze();

  const source = options.config ?? createConfigStore();
  const values = isConfigStore(source) ? source.getAll() : source;
  const window = openConfigWindow(values);

  const configured = window.config.get("maxExpansionDepth");
  const maxDepth =
    options.maxExpansionDepth ??
    (typeof configured === "number" ? configured : DEFAULT_MAX_EXPANSION_DEPTH);

  const verbose = options.verbose ?? false;
  if (verbose) {
    console.log(
      `[shapemacro] Registered macros: ${registry
        .getAll()
        .map((def) => describeSignature(def.signature))
        .join(", ")}`,
    );
  }

  return {
    run: {
      registry,
      config: window.config,
      locations: options.locations ?? new LocationTable(),
      collector: new DiagnosticCollector(),
      maxDepth,
      verbose,
    },
    close: () => window.close(),
  };
}

// ============================================================================
// Unit expansion
// ============================================================================

interface Frame {
  readonly depth: number;
  /** Scope anchor for rescanned syntax: the call site it came from */
  readonly anchor: ts.Node | undefined;
}

const ROOT_FRAME: Frame = { depth: 0, anchor: undefined };

interface Expansion {
  readonly result: ReplacementResult;
  readonly definition: MacroDefinition;
  readonly callSite: CallSite;
  /** Frame the replacement is rescanned in */
  readonly inner: Frame;
}

function holdsStatementList(node: ts.Node): boolean {
  return (
    ts.isSourceFile(node) ||
    ts.isBlock(node) ||
    ts.isModuleBlock(node) ||
    ts.isCaseClause(node) ||
    ts.isDefaultClause(node)
  );
}

class UnitExpander {
  expansions = 0;

  constructor(
    private readonly run: ExpansionRun,
    private readonly unit: string,
    private readonly context: ts.TransformationContext,
  ) {}

  expandRoot(sourceFile: ts.SourceFile): ts.SourceFile {
    return ts.visitNode(sourceFile, (node) => this.visit(node, ROOT_FRAME, false), ts.isSourceFile);
  }

  /**
   * @param inList whether `node` sits in a statement list, where an
   * emptied statement can be dropped instead of left as `;`
   */
  private visit(node: ts.Node, frame: Frame, inList: boolean): ts.Node | undefined {
    if (ts.isExpressionStatement(node) && ts.isCallExpression(node.expression)) {
      return this.visitCallStatement(node, node.expression, frame, inList);
    }
    if (ts.isCallExpression(node)) {
      const expansion = this.tryExpand(node, frame);
      if (expansion) return this.substituteExpression(expansion);
    }
    return this.visitChildren(node, frame);
  }

  private visitChildren<T extends ts.Node>(node: T, frame: Frame): T {
    const inStatementList = holdsStatementList(node);
    return ts.visitEachChild(
      node,
      (child) => this.visit(child, frame, inStatementList),
      this.context,
    );
  }

  /** A call in statement position, where EMPTY and statements may replace it. */
  private visitCallStatement(
    statement: ts.ExpressionStatement,
    call: ts.CallExpression,
    frame: Frame,
    inList: boolean,
  ): ts.Node | undefined {
    const expansion = this.tryExpand(call, frame);
    if (expansion) return this.substituteStatement(statement, expansion, inList);
    return this.context.factory.updateExpressionStatement(
      statement,
      this.visitChildren(call, frame),
    );
  }

  private visitExpression(node: ts.Expression, frame: Frame): ts.Expression {
    return ts.visitNode(node, (child) => this.visit(child, frame, false), ts.isExpression);
  }

  private substituteStatement(
    statement: ts.ExpressionStatement,
    { result, inner }: Expansion,
    inList: boolean,
  ): ts.Node | undefined {
    const factory = this.context.factory;
    if (result === EMPTY) {
      return inList ? undefined : factory.createEmptyStatement();
    }
    if (ts.isExpression(result)) {
      return this.visit(factory.updateExpressionStatement(statement, result), inner, inList);
    }
    return this.visit(result, inner, inList);
  }

  private substituteExpression({ result, definition, callSite, inner }: Expansion): ts.Expression {
    if (result === EMPTY) {
      return this.context.factory.createVoidZero();
    }
    if (!ts.isExpression(result)) {
      throw new MacroExecutionError(
        definition.signature.name,
        callSite.span,
        "returned a statement for a call in expression position",
      );
    }
    return this.visitExpression(result, inner);
  }

  private tryExpand(node: ts.CallExpression, frame: Frame): Expansion | undefined {
    const callSite = toCallSite(node, this.run.locations);
    if (!callSite) return undefined;

    const candidates = this.run.registry.lookup(callSite.callee);
    if (candidates.length === 0) return undefined;

    const match = matchCallSite(callSite, candidates);
    if (match.kind === "no-match") {
      if (this.run.verbose) {
        console.log(
          `[shapemacro] No match for ${callSite.callee} at ${formatLocation(callSite.span)}`,
        );
        for (const rejection of match.rejections) {
          console.log(`[shapemacro]   ${describeRejection(rejection)}`);
        }
      }
      return undefined;
    }

    const { definition } = match;
    if (frame.depth >= this.run.maxDepth) {
      throw new RecursionLimitError(definition.signature.name, callSite.span, this.run.maxDepth);
    }

    if (this.run.verbose) {
      const where = formatLocation(callSite.span);
      console.log(`[shapemacro] Expanding ${describeSignature(definition.signature)} at ${where}`);
    }

    const anchor = frame.anchor ?? node;
    const result = invokeMacro(definition, callSite, {
      config: this.run.config,
      locations: this.run.locations,
      factory: this.context.factory,
      scopeAnchor: anchor,
      report: (diagnostic) => this.run.collector.report({ ...diagnostic, unit: this.unit }),
    });
    if (result !== EMPTY) {
      this.run.locations.propagate(node, result);
    }
    this.expansions++;

    return { result, definition, callSite, inner: { depth: frame.depth + 1, anchor } };
  }
}

export function scriptKindFor(fileName: string): ts.ScriptKind {
  if (fileName.endsWith(".tsx")) return ts.ScriptKind.TSX;
  if (fileName.endsWith(".js") || fileName.endsWith(".mjs") || fileName.endsWith(".cjs")) {
    return ts.ScriptKind.JS;
  }
  if (fileName.endsWith(".jsx")) return ts.ScriptKind.JSX;
  return ts.ScriptKind.TS;
}

/** Whether every parsed node below `node` has its parent pointer set */
function hasParentPointers(node: ts.Node): boolean {
  const missing = ts.forEachChild(node, (child) =>
    child.pos >= 0 && (child.parent === undefined || !hasParentPointers(child)) ? true : undefined,
  );
  return missing === undefined;
}

/**
 * The scope view walks parent pointers, which a compiler host may leave
 * unset on the files it parses. Such a unit is parsed again from its text
 * with them; synthesized nodes from earlier transformations are not checked.
 */
function withParentPointers(sourceFile: ts.SourceFile): ts.SourceFile {
  if (hasParentPointers(sourceFile)) return sourceFile;
  return ts.createSourceFile(
    sourceFile.fileName,
    sourceFile.text,
    sourceFile.languageVersion,
    true,
    scriptKindFor(sourceFile.fileName),
  );
}

function failureDiagnostic(error: unknown, unit: string): MacroDiagnostic {
  if (error instanceof MacroError) {
    return error.toDiagnostic(unit);
  }
  const reason = error instanceof Error ? error.message : String(error);
  return { code: SM2001.code, severity: "error", message: formatMessage(SM2001, { reason }), unit };
}

/**
 * Expand one unit within an open run. A fatal error is reported and the
 * original unit is returned with `failed: true`.
 */
export function expandWithin(sourceFile: ts.SourceFile, run: ExpansionRun): UnitResult {
  const fileName = sourceFile.fileName;
  if (run.verbose) {
    console.log(`[shapemacro] Processing: ${fileName}`);
  }
  const unit = withParentPointers(sourceFile);
  run.locations.recordSourceFile(unit);

  let expansions = 0;
  try {
    const result = ts.transform(unit, [
      (context) => (root) => {
        const expander = new UnitExpander(run, fileName, context);
        const expanded = expander.expandRoot(root);
        expansions = expander.expansions;
        return expanded;
      },
    ]);
    const [expanded] = result.transformed;
    result.dispose();
    return {
      fileName,
      sourceFile: expanded,
      failed: false,
      expansions,
      diagnostics: run.collector.forUnit(fileName),
    };
  } catch (error) {
    run.collector.report(failureDiagnostic(error, fileName));
    if (run.verbose) {
      console.log(`[shapemacro] Expansion of ${fileName} failed`);
    }
    return {
      fileName,
      sourceFile,
      failed: true,
      expansions,
      diagnostics: run.collector.forUnit(fileName),
    };
  }
}

/**
 * Expand a single compilation unit in a run of its own.
 */
export function expandUnit(
  sourceFile: ts.SourceFile,
  registry: MacroRegistry,
  options: ExpansionOptions = {},
): UnitResult {
  const [unit] = expandUnits([sourceFile], registry, options).units;
  return unit;
}

/**
 * Expand every unit with one frozen registry and one configuration window.
 * Units are processed one after another; a failed unit does not stop the
 * others, and all diagnostics are returned together.
 */
export function expandUnits(
  sourceFiles: readonly ts.SourceFile[],
  registry: MacroRegistry,
  options: ExpansionOptions = {},
): ExpansionRunResult {
  const { run, close } = openRun(registry, options);
  try {
    const units = sourceFiles.map((sourceFile) => expandWithin(sourceFile, run));
    return {
      units,
      diagnostics: run.collector.getAll(),
      failed: units.some((unit) => unit.failed),
    };
  } finally {
    close();
  }
}
