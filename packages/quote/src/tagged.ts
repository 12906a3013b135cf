/**
 * Tagged-template front ends for the template engine.
 *
 * @example
 * ```typescript
 * // Built once, materialized per call site
 * const WARNING = template`
 *   !(${expr("cond")}) && println(${value("location")} + ": " + ${expr("msg")})
 * `;
 *
 * // One-shot: splice nodes and values directly
 * const node = quote(ctx)`!(${cond}) && println(${ctx.locationString} + ": " + ${msg})`;
 * ```
 */

import type ts from "typescript";
import { isLiteralValue, type LiteralValue, type MacroContext } from "@shapemacro/core";
import {
  materialize,
  parseTemplate,
  type ExpressionBindings,
  type HoleKind,
  type Template,
  type TemplateKind,
  type ValueBindings,
} from "./template.js";

/** A named hole inside a `template` literal */
export interface HoleMarker {
  readonly hole: string;
  readonly kind: HoleKind;
}

/** Expression splice marker: `${expr("cond")}` is written `$cond` */
export function expr(name: string): HoleMarker {
  return { hole: name, kind: "expression" };
}

/** Value splice marker: `${value("n")}` is written `$$n` */
export function value(name: string): HoleMarker {
  return { hole: name, kind: "value" };
}

function holeText(marker: HoleMarker): string {
  return marker.kind === "expression" ? `$${marker.hole}` : `$$${marker.hole}`;
}

function assemble(strings: TemplateStringsArray, markers: readonly HoleMarker[]): string {
  return strings.reduce(
    (code, text, i) => code + text + (i < markers.length ? holeText(markers[i]) : ""),
    "",
  );
}

/** Expression template from a tagged literal with hole markers. */
export function template(
  strings: TemplateStringsArray,
  ...markers: HoleMarker[]
): Template<"expression"> {
  return parseTemplate(assemble(strings, markers));
}

/** Statement template from a tagged literal with hole markers. */
export function statements(
  strings: TemplateStringsArray,
  ...markers: HoleMarker[]
): Template<"statements"> {
  return parseTemplate(assemble(strings, markers), { kind: "statements" });
}

// =============================================================================
// quote: parse and materialize in one step
// =============================================================================

/** A node is spliced as an expression; a scalar as a literal value. */
export type QuoteSplice = ts.Expression | LiteralValue;

interface Bound {
  markers: HoleMarker[];
  expressions: Record<string, ts.Expression>;
  values: Record<string, LiteralValue>;
}

function bind(splices: readonly QuoteSplice[]): Bound {
  const bound: Bound = { markers: [], expressions: {}, values: {} };
  splices.forEach((splice, i) => {
    const name = `_${i}`;
    if (isLiteralValue(splice)) {
      bound.markers.push(value(name));
      bound.values[name] = splice;
    } else {
      bound.markers.push(expr(name));
      bound.expressions[name] = splice;
    }
  });
  return bound;
}

function quoteAs<K extends TemplateKind>(
  kind: K,
  strings: TemplateStringsArray,
  splices: readonly QuoteSplice[],
): { template: Template<K>; expressions: ExpressionBindings; values: ValueBindings } {
  const { markers, expressions, values } = bind(splices);
  return { template: parseTemplate(assemble(strings, markers), { kind }), expressions, values };
}

/**
 * Expression quasiquote bound to a macro context. Each splice becomes its
 * own hole.
 */
export function quote(
  ctx: MacroContext,
): (strings: TemplateStringsArray, ...splices: QuoteSplice[]) => ts.Expression {
  return (strings, ...splices) => {
    const { template, expressions, values } = quoteAs("expression", strings, splices);
    return materialize(template, expressions, values, ctx.factory);
  };
}

/**
 * Statement quasiquote bound to a macro context.
 */
export function quoteStatements(
  ctx: MacroContext,
): (strings: TemplateStringsArray, ...splices: QuoteSplice[]) => ts.Statement[] {
  return (strings, ...splices) => {
    const { template, expressions, values } = quoteAs("statements", strings, splices);
    return materialize(template, expressions, values, ctx.factory);
  };
}
