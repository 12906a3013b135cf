/**
 * Location Tracker
 *
 * Source spans are recorded once per parsed node and never change. Nodes a
 * macro introduces have no span of their own; the driver propagates the call
 * site's span onto them unless the macro pinned them as synthetic.
 */

import ts from "typescript";
import type { SourceSpan } from "./types.js";

const SYNTHETIC = Symbol("synthetic");

type LocationEntry = SourceSpan | typeof SYNTHETIC;

export class LocationTable {
  private readonly entries = new WeakMap<ts.Node, LocationEntry>();

  /**
   * Assign spans to every node of a freshly parsed source file. Nodes that
   * already carry a span keep it.
   */
  recordSourceFile(sourceFile: ts.SourceFile): void {
    const visit = (node: ts.Node): void => {
      if (!this.entries.has(node) && node.pos >= 0) {
        this.entries.set(node, spanOf(sourceFile, node));
      }
      ts.forEachChild(node, visit);
    };
    visit(sourceFile);
  }

  /**
   * The span of `node`, falling back along the original-node chain for
   * nodes a transformation has updated.
   */
  locate(node: ts.Node): SourceSpan | undefined {
    for (let current: ts.Node | undefined = node; current; current = originalOf(current)) {
      const entry = this.entries.get(current);
      if (entry === SYNTHETIC) return undefined;
      if (entry) return entry;
    }
    return undefined;
  }

  isSynthetic(node: ts.Node): boolean {
    return this.entries.get(node) === SYNTHETIC;
  }

  /** Pin `node` to "no location"; propagation will leave it alone. */
  markSynthetic<T extends ts.Node>(node: T): T {
    if (!this.entries.has(node)) {
      this.entries.set(node, SYNTHETIC);
    }
    return node;
  }

  /**
   * Assign a span to a node that has none. A node that already has a span
   * (or is synthetic) is left unchanged.
   */
  assign(node: ts.Node, span: SourceSpan): boolean {
    if (this.entries.has(node)) return false;
    this.entries.set(node, span);
    return true;
  }

  /**
   * Copy the span of `from` onto `to` and every descendant of `to` that has
   * none. Descendants with their own span (captured call-site syntax) keep
   * it, and synthetic subtrees are skipped entirely.
   */
  propagate(from: ts.Node, to: ts.Node): void {
    const span = this.locate(from);
    if (!span) return;

    const visit = (node: ts.Node): void => {
      const entry = this.entries.get(node);
      if (entry === SYNTHETIC) return;
      if (!entry && !hasOriginalSpan(this, node)) {
        this.entries.set(node, span);
      }
      ts.forEachChild(node, visit);
    };
    visit(to);
  }
}

function hasOriginalSpan(table: LocationTable, node: ts.Node): boolean {
  const original = originalOf(node);
  return original !== undefined && table.locate(original) !== undefined;
}

/**
 * One step along the original-node chain. `ts.getOriginalNode` jumps to the
 * end of the chain, which skips nodes that were given a span on the way.
 */
function originalOf(node: ts.Node): ts.Node | undefined {
  const original: unknown = Reflect.get(node, "original");
  return isNode(original) ? original : undefined;
}

/** Whether a value is a syntax node. */
export function isNode(value: unknown): value is ts.Node {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    typeof value.kind === "number"
  );
}

function spanOf(sourceFile: ts.SourceFile, node: ts.Node): SourceSpan {
  const start = sourceFile.getLineAndCharacterOfPosition(
    ts.isSourceFile(node) ? 0 : node.getStart(sourceFile),
  );
  const end = sourceFile.getLineAndCharacterOfPosition(node.end);
  return Object.freeze({
    file: sourceFile.fileName,
    startLine: start.line + 1,
    startColumn: start.character + 1,
    endLine: end.line + 1,
    endColumn: end.character + 1,
  });
}

/** `file:line:column` of a span, or `<synthetic>` when there is none. */
export function formatLocation(span: SourceSpan | undefined): string {
  return span ? `${span.file}:${span.startLine}:${span.startColumn}` : "<synthetic>";
}

export function spansEqual(a: SourceSpan | undefined, b: SourceSpan | undefined): boolean {
  if (a === b) return true;
  if (!a || !b) return false;
  return (
    a.file === b.file &&
    a.startLine === b.startLine &&
    a.startColumn === b.startColumn &&
    a.endLine === b.endLine &&
    a.endColumn === b.endColumn
  );
}
