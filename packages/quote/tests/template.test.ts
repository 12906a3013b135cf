/**
 * Tests for template parsing and materialization
 */

import { describe, it, expect } from "vitest";
import ts from "typescript";
import {
  LocationTable,
  TemplateSyntaxError,
  UnresolvedHoleError,
  createMacroContext,
  openConfigWindow,
  parseExpression,
  printNode,
} from "@shapemacro/core";
import {
  expr,
  materialize,
  parseTemplate,
  quote,
  statements,
  template,
  value,
} from "../src/index.js";

function sourceArgument(code: string): ts.Expression {
  const sourceFile = ts.createSourceFile("call.ts", code, ts.ScriptTarget.Latest, true);
  const [statement] = sourceFile.statements;
  if (!ts.isExpressionStatement(statement) || !ts.isCallExpression(statement.expression)) {
    throw new Error("expected a call statement");
  }
  return statement.expression.arguments[0];
}

describe("parseTemplate", () => {
  it("records holes by kind in order of appearance", () => {
    const t = parseTemplate("$a + $$b + $a");
    expect(t.kind).toBe("expression");
    expect([...t.holes]).toEqual([
      ["a", "expression"],
      ["b", "value"],
    ]);
  });

  it("treats a bare $ as an ordinary identifier", () => {
    expect([...parseTemplate("$(selector)").holes]).toEqual([]);
  });

  it("rejects a name used as both hole kinds", () => {
    expect(() => parseTemplate("$a + $$a")).toThrow(TemplateSyntaxError);
  });

  it("rejects holes outside expression positions", () => {
    expect(() => parseTemplate("foo.$name")).toThrow(TemplateSyntaxError);
    expect(() => parseTemplate("({ $key: 1 })")).toThrow(TemplateSyntaxError);
    expect(() => parseTemplate("let $x = 1;", { kind: "statements" })).toThrow(TemplateSyntaxError);
  });

  it("reports parse failures as template syntax errors", () => {
    expect(() => parseTemplate("a +")).toThrow(TemplateSyntaxError);
  });
});

describe("materialize", () => {
  it("fills expression and value holes", () => {
    const t = parseTemplate(`!($cond) && println($$location + ": " + $msg)`);
    const result = materialize(
      t,
      { cond: parseExpression("age >= 18"), msg: parseExpression('"x"') },
      { location: "main.ts:3:1" },
    );
    expect(printNode(result)).toBe(`!(age >= 18) && println("main.ts:3:1" + ": " + "x")`);
  });

  it("embeds the bound node itself", () => {
    const bound = parseExpression("a.b");
    const result = materialize(parseTemplate("$x"), { x: bound });
    expect(result).toBe(bound);
  });

  it("keeps captured call-site syntax as written", () => {
    const arg = sourceArgument("f(a + 1);");
    const result = materialize(parseTemplate("$x * 2"), { x: arg });
    expect(printNode(result)).toBe("(a + 1) * 2");
  });

  it("parenthesizes a replacement used as a callee or operand", () => {
    const callee = parseExpression("a ? b : c");
    expect(printNode(materialize(parseTemplate("$f(1)"), { f: callee }))).toBe("(a ? b : c)(1)");
    expect(printNode(materialize(parseTemplate("$$n.toFixed(2)"), {}, { n: -1.5 }))).toBe(
      "(-1.5).toFixed(2)",
    );
  });

  it("turns scalars into literals", () => {
    const t = parseTemplate("[$$s, $$n, $$big, $$yes, $$none]");
    const result = materialize(t, {}, { s: "hi", n: 42, big: 7n, yes: true, none: null });
    expect(printNode(result)).toBe(`["hi", 42, 7n, true, null]`);
  });

  it("fails with every unbound hole", () => {
    const t = parseTemplate("$a + $$b");
    try {
      materialize(t);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnresolvedHoleError);
      if (error instanceof UnresolvedHoleError) {
        expect(error.holes).toEqual(["$$b", "$a"]);
        expect(error.code).toBe("SM3001");
      }
    }
  });

  it("does not accept an expression binding for a value hole", () => {
    expect(() => materialize(parseTemplate("$$n"), { n: parseExpression("1") })).toThrow(
      UnresolvedHoleError,
    );
  });

  it("is idempotent for identical bindings", () => {
    const t = parseTemplate("$f($$v) || $f(0)");
    const f = parseExpression("check");
    const first = materialize(t, { f }, { v: 1 });
    const second = materialize(t, { f }, { v: 1 });
    expect(first).not.toBe(second);
    expect(printNode(first)).toBe(printNode(second));
    expect(printNode(first)).toBe("check(1) || check(0)");
  });

  it("splices the result of another materialization", () => {
    const inner = materialize(parseTemplate("$a + 1"), { a: parseExpression("count") });
    const outer = materialize(parseTemplate("$x * 2"), { x: inner });
    expect(printNode(outer)).toBe("(count + 1) * 2");
  });

  it("materializes statement templates", () => {
    const t = parseTemplate("if ($cond) { throw new Error($$message); }", { kind: "statements" });
    const [statement, ...rest] = materialize(
      t,
      { cond: parseExpression("!ok") },
      { message: "boom" },
    );
    expect(rest).toHaveLength(0);
    expect(ts.isIfStatement(statement)).toBe(true);
    if (ts.isIfStatement(statement)) {
      expect(printNode(statement.expression)).toBe("!ok");
    }
  });
});

describe("tagged helpers", () => {
  it("builds templates from hole markers", () => {
    const t = template`!(${expr("cond")}) || ${value("fallback")}`;
    expect(t.source).toBe("!($cond) || $$fallback");
    expect(printNode(materialize(t, { cond: parseExpression("x") }, { fallback: 0 }))).toBe(
      "!(x) || 0",
    );
  });

  it("builds statement templates", () => {
    const t = statements`log(${expr("a")}); log(${expr("b")});`;
    expect(t.kind).toBe("statements");
    expect([...t.holes.keys()]).toEqual(["a", "b"]);
  });

  it("quotes nodes and values in one step", () => {
    const window = openConfigWindow({});
    const ctx = createMacroContext({
      macroName: "test",
      span: undefined,
      config: window.config,
      locations: new LocationTable(),
    });
    const cond = ctx.createIdentifier("ready");
    expect(printNode(quote(ctx)`${cond} ? ${1} : ${"no"}`)).toBe(`ready ? 1 : "no"`);
  });
});
