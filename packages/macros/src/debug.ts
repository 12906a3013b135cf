/**
 * debugOnly(() => { ... }) - code that only exists in debug builds
 */

import { EMPTY, defineMacro } from "@shapemacro/core";
import { materialize, parseTemplate } from "@shapemacro/quote";

const INVOKE = parseTemplate("$fn()");

export const debugOnlyMacro = defineMacro({
  name: "debugOnly",
  params: ["lambda"],
  description: "Call the lambda in place when debug is set; otherwise remove the call",
  expand(ctx, [fn]) {
    if (!ctx.config.evaluate("debug")) {
      return EMPTY;
    }
    return materialize(INVOKE, { fn }, {}, ctx.factory);
  },
});
