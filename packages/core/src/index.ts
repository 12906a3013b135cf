/**
 * Core module exports for @shapemacro/core
 *
 * This package provides:
 * - Macro system types, registry and call-site matching
 * - Source-location tracking
 * - Compile-time configuration and diagnostics
 */

export * from "./types.js";

// Registry
export {
  createRegistry,
  defineMacro,
  registerMacro,
  registerMacros,
  type MacroSpec,
} from "./registry.js";

// Matching
export { classifyExpression, shapeAccepts, isParameterShape, PARAMETER_SHAPES } from "./shapes.js";
export {
  matchCallSite,
  toCallSite,
  describeRejection,
  type MatchResult,
  type MatchRejection,
} from "./matcher.js";

// Declaration surface
export {
  collectMacroDeclarations,
  registerDeclaredMacros,
  signatureFromDeclaration,
  DECLARED_TYPE_SHAPES,
  CONTEXT_TYPE_NAME,
  type MacroDeclaration,
} from "./declarations.js";

// Locations
export { LocationTable, formatLocation, spansEqual, isNode } from "./location.js";

// Context
export { MacroContextImpl, createMacroContext, type MacroContextInit } from "./context.js";
export { ScopeView, EMPTY_SCOPE } from "./scope.js";

// Configuration System
export {
  createConfigStore,
  openConfigWindow,
  evaluateCondition,
  loadConfigFromEnv,
  loadConfigFromFiles,
  defineConfig,
  deepMerge,
  getNestedValue,
  DEFAULT_CONFIG,
  DEFAULT_MAX_EXPANSION_DEPTH,
  type ShapemacroConfig,
  type ConfigRecord,
  type ConfigStore,
  type ConfigStoreOptions,
  type ConfigWindow,
} from "./config.js";

// Errors and Diagnostics
export * from "./errors.js";
export * from "./diagnostics.js";

// AST Utilities
export {
  valueToExpression,
  isLiteralValue,
  stripPositions,
  parseExpression,
  parseStatements,
  parseDiagnosticsOf,
  printNode,
  getPrinter,
  ParseError,
  type LiteralValue,
} from "./ast-utils.js";
