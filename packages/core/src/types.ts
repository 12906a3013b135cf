/**
 * Core types for the shapemacro expansion engine
 */

import type ts from "typescript";

// ============================================================================
// Shapes
// ============================================================================

/**
 * Structural classes of expression syntax. This list is closed: matching
 * is extended by adding a member here and a case in `classifyExpression`.
 */
export const EXPRESSION_SHAPES = [
  "literal",
  "identifier",
  "lambda",
  "call",
  "binary",
  "unary",
  "member",
  "object",
  "array",
  "conditional",
  "other",
] as const;

/** Shape of a concrete argument node, as classified at a call site. */
export type ExpressionShape = (typeof EXPRESSION_SHAPES)[number];

/**
 * Shape a macro declares for one of its parameters. `"any"` accepts every
 * argument; `"other"` is never declared.
 */
export type ParameterShape = "any" | Exclude<ExpressionShape, "other">;

export type Expr = ts.Expression;

export type LiteralExpr =
  | ts.StringLiteral
  | ts.NumericLiteral
  | ts.BigIntLiteral
  | ts.NoSubstitutionTemplateLiteral
  | ts.RegularExpressionLiteral
  | ts.TrueLiteral
  | ts.FalseLiteral
  | ts.NullLiteral;

export type LambdaExpr = ts.ArrowFunction | ts.FunctionExpression;
export type CallExpr = ts.CallExpression;
export type IdentifierExpr = ts.Identifier;
export type BinaryExpr = ts.BinaryExpression;
export type UnaryExpr = ts.PrefixUnaryExpression | ts.PostfixUnaryExpression;
export type MemberExpr = ts.PropertyAccessExpression | ts.ElementAccessExpression;

/** The node type a macro receives for an argument declared with shape `S`. */
export interface ShapeNodeMap {
  any: Expr;
  literal: LiteralExpr;
  identifier: IdentifierExpr;
  lambda: LambdaExpr;
  call: CallExpr;
  binary: BinaryExpr;
  unary: UnaryExpr;
  member: MemberExpr;
  object: ts.ObjectLiteralExpression;
  array: ts.ArrayLiteralExpression;
  conditional: ts.ConditionalExpression;
}

export type ShapeArgs<P extends readonly ParameterShape[]> = {
  readonly [K in keyof P]: P[K] extends ParameterShape ? ShapeNodeMap[P[K]] : never;
};

// ============================================================================
// Source Locations
// ============================================================================

/** 1-based source span. Immutable once assigned. */
export interface SourceSpan {
  readonly file: string;
  readonly startLine: number;
  readonly startColumn: number;
  readonly endLine: number;
  readonly endColumn: number;
}

// ============================================================================
// Signatures and Definitions
// ============================================================================

/**
 * Name and declared argument shapes of a macro. The leading context
 * parameter is not part of `params` and is never matched.
 */
export interface MacroSignature {
  readonly name: string;
  readonly params: readonly ParameterShape[];
}

/** Marker result: the call site is deleted. */
export const EMPTY: unique symbol = Symbol.for("shapemacro.empty");
export type EmptyResult = typeof EMPTY;

export type ReplacementResult = ts.Expression | ts.Statement | EmptyResult;

/**
 * A macro implementation. Receives the invocation context and the raw,
 * unevaluated argument nodes in call order.
 */
export type MacroImplementation = (
  ctx: MacroContext,
  args: readonly ts.Expression[],
) => ReplacementResult;

export interface MacroDefinition {
  readonly signature: MacroSignature;

  /** Optional description for documentation */
  readonly description?: string;

  /** Library that registered the macro, for conflict messages */
  readonly origin?: string;

  /** Position in registration order; lower wins on overlapping matches */
  readonly order: number;

  expand(ctx: MacroContext, args: readonly ts.Expression[]): ReplacementResult;
}

export interface RegisterOptions {
  description?: string;
  origin?: string;
}

export interface MacroRegistry {
  /** Register an implementation under a signature */
  register(
    signature: MacroSignature,
    implementation: MacroImplementation,
    options?: RegisterOptions,
  ): MacroDefinition;

  /** All definitions registered under `name`, in registration order */
  lookup(name: string): readonly MacroDefinition[];

  /** Signatures registered under `name`, in registration order */
  signatures(name: string): readonly MacroSignature[];

  /** Reject further registrations */
  freeze(): void;

  readonly isFrozen: boolean;

  readonly size: number;

  getAll(): readonly MacroDefinition[];
}

// ============================================================================
// Call Sites
// ============================================================================

export interface CallSite {
  readonly callee: string;
  readonly args: readonly ts.Expression[];
  readonly span: SourceSpan | undefined;
  readonly node: ts.CallExpression;
}

// ============================================================================
// Macro Context - Available to implementations during expansion
// ============================================================================

/** Lookup-only view of the syntactic scope around a call site. */
export interface ScopeLookup {
  /** Find the nearest declaration of `name`, if any */
  lookup(name: string): ts.Declaration | undefined;

  /** Whether `name` is declared in an enclosing scope */
  has(name: string): boolean;
}

/** Compile-time configuration, readable only while expansion runs. */
export interface CompileTimeConfig {
  get<T = unknown>(path: string): T | undefined;
  has(path: string): boolean;
  evaluate(condition: string): boolean;
}

export interface MacroContext {
  /** Name of the macro being expanded */
  readonly macroName: string;

  /** Span of the call site (undefined when the call itself is synthetic) */
  readonly span: SourceSpan | undefined;

  /** `file:line:column` of the call site, or `<synthetic>` */
  readonly locationString: string;

  readonly scope: ScopeLookup;

  readonly config: CompileTimeConfig;

  readonly factory: ts.NodeFactory;

  createIdentifier(name: string): ts.Identifier;
  createStringLiteral(value: string): ts.StringLiteral;
  createNumericLiteral(value: number): ts.Expression;
  createBooleanLiteral(value: boolean): ts.Expression;

  /** Parse a code string into an expression */
  parseExpression(code: string): ts.Expression;

  /** Exclude a node from call-site location propagation */
  synthetic<T extends ts.Node>(node: T): T;

  /** Report a non-fatal warning at the call site */
  reportWarning(message: string): void;
}
