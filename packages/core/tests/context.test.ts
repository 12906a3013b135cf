/**
 * Tests for the macro context and its scope view
 */

import { describe, it, expect } from "vitest";
import ts from "typescript";
import {
  EMPTY_SCOPE,
  LocationTable,
  ScopeView,
  createMacroContext,
  openConfigWindow,
  printNode,
  type MacroDiagnostic,
  type SourceSpan,
} from "@shapemacro/core";

const SOURCE = `
import def, { a } from "mod";
import * as ns from "ns";
function outer(p) {
  const { q, r: [s] } = p;
  for (const i of xs) {
    target(i);
  }
  class Inner {}
}
const late = 1;
`;

function targetCall(): ts.CallExpression {
  const sourceFile = ts.createSourceFile("scope.ts", SOURCE, ts.ScriptTarget.Latest, true);
  let found: ts.CallExpression | undefined;
  const visit = (node: ts.Node): void => {
    if (ts.isCallExpression(node)) found = node;
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);
  if (!found) throw new Error("no call");
  return found;
}

describe("ScopeView", () => {
  const scope = new ScopeView(targetCall());

  it.each(["i", "q", "s", "p", "outer", "Inner", "def", "a", "ns", "late"])("sees %s", (name) => {
    expect(scope.has(name)).toBe(true);
  });

  it.each(["r", "xs", "target", "missing"])("does not see %s", (name) => {
    expect(scope.has(name)).toBe(false);
  });

  it("returns the nearest declaration", () => {
    const declaration = scope.lookup("i");
    expect(declaration && ts.isVariableDeclaration(declaration)).toBe(true);
  });

  it("finds nothing without an anchor", () => {
    expect(new ScopeView(undefined).has("a")).toBe(false);
    expect(EMPTY_SCOPE.lookup("a")).toBeUndefined();
  });
});

describe("MacroContext", () => {
  const span: SourceSpan = {
    file: "ctx.ts",
    startLine: 4,
    startColumn: 2,
    endLine: 4,
    endColumn: 9,
  };

  function context(reported: MacroDiagnostic[] = [], at: SourceSpan | undefined = span) {
    return createMacroContext({
      macroName: "probe",
      span: at,
      config: openConfigWindow({ debug: true }).config,
      locations: new LocationTable(),
      report: (diagnostic) => reported.push(diagnostic),
    });
  }

  it("formats its location", () => {
    expect(context().locationString).toBe("ctx.ts:4:2");
    expect(context([], undefined).locationString).toBe("<synthetic>");
  });

  it("creates literals", () => {
    const ctx = context();
    expect(printNode(ctx.createStringLiteral("hi"))).toBe(`"hi"`);
    expect(printNode(ctx.createNumericLiteral(-2))).toBe("-2");
    expect(printNode(ctx.createBooleanLiteral(false))).toBe("false");
    expect(printNode(ctx.parseExpression("a+b"))).toBe("a + b");
  });

  it("reports warnings at the call site", () => {
    const reported: MacroDiagnostic[] = [];
    context(reported).reportWarning("deprecated");
    expect(reported).toEqual([
      { code: "SM2003", severity: "warning", message: "deprecated", macroName: "probe", span },
    ]);
  });

  it("defaults to an empty scope", () => {
    expect(context().scope).toBe(EMPTY_SCOPE);
  });

  it("reads configuration", () => {
    expect(context().config.evaluate("debug")).toBe(true);
  });
});
