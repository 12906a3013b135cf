/**
 * Macro Registry - Stores macro definitions for one expansion run
 *
 * Several definitions may share a name; they are kept in registration order
 * and the matcher picks among them. An identical (name, shapes) pair is a
 * registration error, and nothing can be registered once the registry is
 * frozen.
 */

import type ts from "typescript";
import { DuplicateSignatureError, RegistryFrozenError } from "./errors.js";
import { classifyExpression, shapeAccepts } from "./shapes.js";
import type {
  MacroContext,
  MacroDefinition,
  MacroImplementation,
  MacroRegistry,
  MacroSignature,
  ParameterShape,
  RegisterOptions,
  ReplacementResult,
  ShapeArgs,
} from "./types.js";

function sameSignature(a: MacroSignature, b: MacroSignature): boolean {
  return (
    a.name === b.name &&
    a.params.length === b.params.length &&
    a.params.every((shape, i) => shape === b.params[i])
  );
}

const NO_DEFINITIONS: readonly MacroDefinition[] = Object.freeze([]);

class MacroRegistryImpl implements MacroRegistry {
  private readonly byName = new Map<string, readonly MacroDefinition[]>();
  private readonly ordered: MacroDefinition[] = [];
  private frozen = false;

  register(
    signature: MacroSignature,
    implementation: MacroImplementation,
    options: RegisterOptions = {},
  ): MacroDefinition {
    if (this.frozen) {
      throw new RegistryFrozenError(signature);
    }

    const existing = this.byName.get(signature.name) ?? [];
    if (existing.some((def) => sameSignature(def.signature, signature))) {
      throw new DuplicateSignatureError(signature, options.origin);
    }

    const definition: MacroDefinition = Object.freeze({
      signature: Object.freeze({
        name: signature.name,
        params: Object.freeze([...signature.params]),
      }),
      description: options.description,
      origin: options.origin,
      order: this.ordered.length,
      expand: implementation,
    });

    this.byName.set(signature.name, Object.freeze([...existing, definition]));
    this.ordered.push(definition);
    return definition;
  }

  lookup(name: string): readonly MacroDefinition[] {
    return this.byName.get(name) ?? NO_DEFINITIONS;
  }

  signatures(name: string): readonly MacroSignature[] {
    return this.lookup(name).map((def) => def.signature);
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.ordered.length;
  }

  getAll(): readonly MacroDefinition[] {
    return [...this.ordered];
  }
}

/** Create a new, empty registry */
export function createRegistry(): MacroRegistry {
  return new MacroRegistryImpl();
}

// ============================================================================
// Macro Definition Helpers
// ============================================================================

/**
 * A macro ready to be registered, with argument nodes typed by the declared
 * shapes.
 */
export interface MacroSpec<P extends readonly ParameterShape[]> {
  name: string;
  params: P;
  description?: string;
  expand(ctx: MacroContext, args: ShapeArgs<P>): ReplacementResult;
}

/**
 * Define a macro with argument types inferred from its shapes
 *
 * @example
 * ```typescript
 * const twice = defineMacro({
 *   name: "twice",
 *   params: ["call"],
 *   expand: (ctx, [call]) =>
 *     ctx.factory.createCommaListExpression([call, call]),
 * });
 * ```
 */
export function defineMacro<const P extends readonly ParameterShape[]>(
  spec: MacroSpec<P>,
): MacroSpec<P> {
  return spec;
}

/**
 * Register a macro spec. The matcher only hands over arguments of the
 * declared shapes; `expand` is still guarded so a direct call with other
 * arguments fails loudly instead of reaching the narrowed types.
 */
export function registerMacro<P extends readonly ParameterShape[]>(
  registry: MacroRegistry,
  spec: MacroSpec<P>,
  origin?: string,
): MacroDefinition {
  const expand = (ctx: MacroContext, args: readonly ts.Expression[]): ReplacementResult => {
    if (!hasShapes(args, spec.params)) {
      throw new Error(
        `${spec.name}: arguments do not match (${spec.params.join(", ")}): ` +
          `got (${args.map(classifyExpression).join(", ")})`,
      );
    }
    return spec.expand(ctx, args);
  };
  return registry.register({ name: spec.name, params: spec.params }, expand, {
    description: spec.description,
    origin,
  });
}

/**
 * Register multiple macros at once
 */
export function registerMacros(
  registry: MacroRegistry,
  macros: readonly MacroSpec<readonly ParameterShape[]>[],
  origin?: string,
): MacroDefinition[] {
  return macros.map((spec) => registerMacro(registry, spec, origin));
}

function hasShapes<P extends readonly ParameterShape[]>(
  args: readonly ts.Expression[],
  params: P,
): args is readonly ts.Expression[] & ShapeArgs<P> {
  return (
    args.length === params.length &&
    args.every((arg, i) => shapeAccepts(params[i], classifyExpression(arg)))
  );
}
