/**
 * Tests for the diagnostic catalog and collector
 */

import { describe, it, expect } from "vitest";
import {
  DiagnosticCollector,
  MacroExecutionError,
  RecursionLimitError,
  SM2001,
  SM2002,
  formatDiagnostic,
  formatMessage,
  getDiagnosticDescriptor,
  type SourceSpan,
} from "@shapemacro/core";

const SPAN: SourceSpan = {
  file: "app.ts",
  startLine: 3,
  startColumn: 5,
  endLine: 3,
  endColumn: 20,
};

describe("catalog", () => {
  it("interpolates message templates", () => {
    expect(formatMessage(SM2002, { limit: 64 })).toBe("expansion depth exceeded the limit of 64");
    expect(formatMessage(SM2001, { reason: undefined })).toBe("expansion failed: ");
  });

  it("finds descriptors by code", () => {
    expect(getDiagnosticDescriptor("SM3001")?.severity).toBe("error");
    expect(getDiagnosticDescriptor("SM2003")?.severity).toBe("warning");
    expect(getDiagnosticDescriptor("SM9999")).toBeUndefined();
  });
});

describe("formatDiagnostic", () => {
  it("renders the span, macro and message", () => {
    expect(
      formatDiagnostic({
        code: "SM2001",
        severity: "error",
        message: "expansion failed: boom",
        macroName: "warn",
        span: SPAN,
      }),
    ).toBe("app.ts:3:5: warn: expansion failed: boom");
  });

  it("falls back to the unit and the tool name", () => {
    expect(
      formatDiagnostic({ code: "SM4001", severity: "error", message: "late", unit: "lib.ts" }),
    ).toBe(
      "lib.ts: shapemacro: late",
    );
    expect(formatDiagnostic({ code: "SM4001", severity: "error", message: "late" })).toBe(
      "<unknown>: shapemacro: late",
    );
  });
});

describe("MacroError diagnostics", () => {
  it("carries code, macro and span", () => {
    const error = new RecursionLimitError("loop", SPAN, 8);
    expect(error.toDiagnostic("app.ts")).toEqual({
      code: "SM2002",
      severity: "error",
      message: "expansion depth exceeded the limit of 8",
      macroName: "loop",
      span: SPAN,
      unit: "app.ts",
    });
  });

  it("keeps a call site it already knew", () => {
    const error = new MacroExecutionError("inner", SPAN, "nope").attachCallSite("outer", undefined);
    expect(error.macroName).toBe("inner");
    expect(error.span).toBe(SPAN);
    expect(error.name).toBe("MacroExecutionError");
  });
});

describe("DiagnosticCollector", () => {
  it("collects diagnostics of every unit in order", () => {
    const collector = new DiagnosticCollector();
    collector.report({
      code: "SM2003",
      severity: "warning",
      message: "careful",
      macroName: "m",
      span: SPAN,
      unit: "app.ts",
    });
    collector.report({
      code: "SM2001",
      severity: "error",
      message: "expansion failed: x",
      macroName: "n",
      unit: "lib.ts",
    });

    expect(collector.getAll().map((d) => d.code)).toEqual(["SM2003", "SM2001"]);
    expect(collector.forUnit("lib.ts").map((d) => d.macroName)).toEqual(["n"]);
    expect(collector.errorCount).toBe(1);
    expect(collector.hasErrors()).toBe(true);
    expect(collector.render()).toEqual([
      "app.ts:3:5: m: careful",
      "lib.ts: n: expansion failed: x",
    ]);
  });

  it("stores frozen copies", () => {
    const collector = new DiagnosticCollector();
    const diagnostic = { code: "SM2003", severity: "warning" as const, message: "a" };
    collector.report(diagnostic);
    diagnostic.message = "b";
    expect(collector.getAll()[0].message).toBe("a");
    expect(Object.isFrozen(collector.getAll()[0])).toBe(true);
  });
});
