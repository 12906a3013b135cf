/**
 * Tests for the macro registry
 */

import { describe, it, expect, beforeEach } from "vitest";
import ts from "typescript";
import {
  DuplicateSignatureError,
  EMPTY,
  LocationTable,
  RegistryFrozenError,
  createMacroContext,
  createRegistry,
  defineMacro,
  openConfigWindow,
  parseExpression,
  registerMacro,
  registerMacros,
  type MacroRegistry,
} from "@shapemacro/core";

describe("MacroRegistry", () => {
  let registry: MacroRegistry;

  beforeEach(() => {
    registry = createRegistry();
  });

  it("keeps definitions sharing a name in registration order", () => {
    registry.register({ name: "m", params: ["literal"] }, () => EMPTY);
    registry.register({ name: "m", params: ["any"] }, () => EMPTY);
    registry.register({ name: "other", params: [] }, () => EMPTY);

    expect(registry.signatures("m")).toEqual([
      { name: "m", params: ["literal"] },
      { name: "m", params: ["any"] },
    ]);
    expect(registry.lookup("m").map((def) => def.order)).toEqual([0, 1]);
    expect(registry.size).toBe(3);
  });

  it("hands out candidate lists that cannot be changed", () => {
    registry.register({ name: "m", params: ["any"] }, () => EMPTY);
    const candidates = registry.lookup("m");

    expect(Object.isFrozen(candidates)).toBe(true);
    expect(Object.isFrozen(registry.lookup("missing"))).toBe(true);
    const push = () => Reflect.apply(Array.prototype.push, candidates, [candidates[0]]);
    expect(push).toThrow(TypeError);
    expect(registry.lookup("m")).toHaveLength(1);
  });

  it("returns nothing for an unknown name", () => {
    expect(registry.lookup("missing")).toEqual([]);
  });

  it("rejects an identical signature", () => {
    registry.register({ name: "f", params: ["literal"] }, () => EMPTY, { origin: "lib-a" });
    expect(() =>
      registry.register({ name: "f", params: ["literal"] }, () => EMPTY, { origin: "lib-b" }),
    ).toThrow(
      new DuplicateSignatureError({ name: "f", params: ["literal"] }, "lib-b"),
    );
    expect(() => registry.register({ name: "f", params: ["literal"] }, () => EMPTY)).toThrow(
      "Macro signature f(literal) is already registered",
    );
  });

  it("accepts overlapping signatures", () => {
    registry.register({ name: "f", params: ["literal"] }, () => EMPTY);
    registry.register({ name: "f", params: ["any"] }, () => EMPTY);
    registry.register({ name: "f", params: ["literal", "literal"] }, () => EMPTY);
    expect(registry.lookup("f")).toHaveLength(3);
  });

  it("refuses registration once frozen", () => {
    registry.register({ name: "f", params: [] }, () => EMPTY);
    registry.freeze();

    expect(registry.isFrozen).toBe(true);
    expect(() => registry.register({ name: "g", params: ["any"] }, () => EMPTY)).toThrow(
      RegistryFrozenError,
    );
    expect(() => registry.register({ name: "g", params: ["any"] }, () => EMPTY)).toThrow(
      "Cannot register g(any): the registry is frozen",
    );
    expect(registry.size).toBe(1);
  });

  it("stores definitions immutably", () => {
    const params: Array<"any" | "literal"> = ["any"];
    const definition = registry.register({ name: "f", params }, () => EMPTY);
    params.push("literal");

    expect(definition.signature.params).toEqual(["any"]);
    expect(Object.isFrozen(definition)).toBe(true);
    expect(Object.isFrozen(definition.signature.params)).toBe(true);
  });

  it("returns a copy from getAll", () => {
    registry.register({ name: "f", params: [] }, () => EMPTY);
    const all = registry.getAll();
    expect(all.map((def) => def.signature.name)).toEqual(["f"]);
    expect(registry.getAll()).not.toBe(all);
  });
});

describe("defineMacro / registerMacro", () => {
  const twice = defineMacro({
    name: "twice",
    params: ["call"],
    description: "Evaluate a call twice",
    expand: (ctx, [call]) => ctx.factory.createCommaListExpression([call, call]),
  });

  function context() {
    return createMacroContext({
      macroName: "twice",
      span: undefined,
      config: openConfigWindow({}).config,
      locations: new LocationTable(),
    });
  }

  it("registers a spec with its description and origin", () => {
    const registry = createRegistry();
    const definition = registerMacro(registry, twice, "my-lib");
    expect(definition.signature).toEqual({ name: "twice", params: ["call"] });
    expect(definition.description).toBe("Evaluate a call twice");
    expect(definition.origin).toBe("my-lib");
  });

  it("hands the typed arguments to the spec", () => {
    const definition = registerMacro(createRegistry(), twice);
    const result = definition.expand(context(), [parseExpression("tick()")]);
    expect(result !== EMPTY && ts.isCommaListExpression(result)).toBe(true);
  });

  it("guards direct calls with arguments of other shapes", () => {
    const definition = registerMacro(createRegistry(), twice);
    expect(() => definition.expand(context(), [parseExpression("1")])).toThrow(
      "twice: arguments do not match (call): got (literal)",
    );
  });

  it("registers several specs in order", () => {
    const registry = createRegistry();
    const definitions = registerMacros(registry, [
      twice,
      defineMacro({ name: "noop", params: [], expand: () => EMPTY }),
    ]);
    expect(definitions.map((def) => def.order)).toEqual([0, 1]);
    expect(registry.getAll().map((def) => def.signature.name)).toEqual(["twice", "noop"]);
  });
});
