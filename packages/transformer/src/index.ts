/**
 * @shapemacro/transformer - Expansion invoker, driver and pipeline
 */

export { invokeMacro, type InvocationEnvironment } from "./invoker.js";

export {
  expandUnit,
  expandUnits,
  expandWithin,
  openRun,
  exitCodeFor,
  type ExpansionOptions,
  type ExpansionRun,
  type ExpansionRunResult,
  type OpenRun,
  type UnitResult,
} from "./driver.js";

export {
  expandSource,
  expandProgram,
  createMacroTransformer,
  parseUnit,
  printUnit,
  renderDiagnostics,
  type ExpandSourceOptions,
  type ExpandSourceResult,
  type MacroTransformer,
} from "./pipeline.js";
