/**
 * Tests for the expansion invoker
 */

import { describe, it, expect } from "vitest";
import ts from "typescript";
import {
  EMPTY,
  LocationTable,
  MacroExecutionError,
  UnresolvedHoleError,
  createRegistry,
  openConfigWindow,
  toCallSite,
  type CallSite,
  type MacroImplementation,
} from "@shapemacro/core";
import { invokeMacro, parseUnit, type InvocationEnvironment } from "../src/index.js";

function setup(code: string): { callSite: CallSite; environment: InvocationEnvironment } {
  const sourceFile = parseUnit(code, "call.ts");
  const locations = new LocationTable();
  locations.recordSourceFile(sourceFile);

  const last = sourceFile.statements[sourceFile.statements.length - 1];
  if (!ts.isExpressionStatement(last) || !ts.isCallExpression(last.expression)) {
    throw new Error("expected a call statement");
  }
  const callSite = toCallSite(last.expression, locations);
  if (!callSite) throw new Error("expected a macro-shaped call");

  const window = openConfigWindow({ features: { warnings: true } });
  return { callSite, environment: { config: window.config, locations } };
}

function define(implementation: MacroImplementation) {
  return createRegistry().register({ name: "m", params: ["any"] }, implementation);
}

describe("invokeMacro", () => {
  it("passes the raw argument nodes", () => {
    const { callSite, environment } = setup("m(a + b);");
    let seen: readonly ts.Expression[] = [];
    const definition = define((_ctx, args) => {
      seen = args;
      return EMPTY;
    });

    expect(invokeMacro(definition, callSite, environment)).toBe(EMPTY);
    expect(seen).toEqual(callSite.args);
    expect(seen[0]).toBe(callSite.args[0]);
  });

  it("gives the macro its call site and configuration", () => {
    const { callSite, environment } = setup("let a = 1;\nm(a);");
    const definition = define((ctx) => {
      expect(ctx.macroName).toBe("m");
      expect(ctx.locationString).toBe("call.ts:2:1");
      expect(ctx.scope.has("a")).toBe(true);
      return ctx.createBooleanLiteral(ctx.config.has("features.warnings"));
    });

    const result = invokeMacro(definition, callSite, environment);
    expect(result !== EMPTY && result.kind).toBe(ts.SyntaxKind.TrueKeyword);
  });

  it("wraps a thrown error with the macro name and call site", () => {
    const { callSite, environment } = setup("m(x);");
    const failure = new TypeError("bad input");
    const definition = define(() => {
      throw failure;
    });

    try {
      invokeMacro(definition, callSite, environment);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MacroExecutionError);
      if (error instanceof MacroExecutionError) {
        expect(error.message).toBe("expansion failed: bad input");
        expect(error.macroName).toBe("m");
        expect(error.span?.startLine).toBe(1);
        expect(error.cause).toBe(failure);
      }
    }
  });

  it("keeps engine errors and fills in the call site", () => {
    const { callSite, environment } = setup("m(x);");
    const definition = define(() => {
      throw new UnresolvedHoleError(["$cond"]);
    });

    try {
      invokeMacro(definition, callSite, environment);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnresolvedHoleError);
      if (error instanceof UnresolvedHoleError) {
        expect(error.code).toBe("SM3001");
        expect(error.macroName).toBe("m");
        expect(error.span).toEqual(callSite.span);
      }
    }
  });

  it("rejects a result that is neither a node nor EMPTY", () => {
    const { callSite, environment } = setup("m(x);");
    const definition = define((_ctx, args) => args[1]);
    expect(() => invokeMacro(definition, callSite, environment)).toThrow(
      "expansion failed: returned undefined; expected an expression, a statement or EMPTY",
    );
  });
});
