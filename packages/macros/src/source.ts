/**
 * Source-introspection macros
 */

import { defineMacro, printNode } from "@shapemacro/core";

/** here() - the `file:line:column` of the call, as a string literal */
export const hereMacro = defineMacro({
  name: "here",
  params: [],
  description: "The location of the call site as a string",
  expand: (ctx) => ctx.createStringLiteral(ctx.locationString),
});

/** stringify(expr) - the source text of an expression, unevaluated */
export const stringifyMacro = defineMacro({
  name: "stringify",
  params: ["any"],
  description: "The source text of the argument as a string",
  expand: (ctx, [expr]) => ctx.createStringLiteral(printNode(expr)),
});
