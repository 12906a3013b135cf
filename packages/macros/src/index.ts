/**
 * @shapemacro/macros - Built-in Macros
 *
 * Nothing registers itself on import: pass `builtinMacros` to a registry
 * before the expansion pass starts.
 *
 * @example
 * ```typescript
 * const registry = createRegistry();
 * registerBuiltins(registry);
 * expandSource(code, registry, { config: { features: { warnings: true } } });
 * ```
 *
 * The functions user code calls are declared in `@shapemacro/macros/runtime`.
 */

import {
  registerMacros,
  type MacroDefinition,
  type MacroRegistry,
  type MacroSpec,
  type ParameterShape,
} from "@shapemacro/core";
import { debugOnlyMacro } from "./debug.js";
import { hereMacro, stringifyMacro } from "./source.js";
import { warnMacro } from "./warn.js";

export { WARNINGS_FLAG, warnMacro } from "./warn.js";
export { debugOnlyMacro } from "./debug.js";
export { hereMacro, stringifyMacro } from "./source.js";

export const BUILTIN_ORIGIN = "@shapemacro/macros";

export const builtinMacros: readonly MacroSpec<readonly ParameterShape[]>[] = [
  warnMacro,
  debugOnlyMacro,
  hereMacro,
  stringifyMacro,
];

/** Register every built-in macro. Call before the registry is frozen. */
export function registerBuiltins(registry: MacroRegistry): MacroDefinition[] {
  return registerMacros(registry, builtinMacros, BUILTIN_ORIGIN);
}
