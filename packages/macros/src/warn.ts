/**
 * warn(cond, msg) - compile-time switchable runtime warning
 *
 * With `features.warnings` enabled, `warn(age >= 18, "too young")` becomes
 *
 * ```typescript
 * !(age >= 18) && println("app.ts:3:5" + ": " + "too young")
 * ```
 *
 * and with the flag off the call is removed.
 */

import { EMPTY, defineMacro } from "@shapemacro/core";
import { materialize, parseTemplate } from "@shapemacro/quote";

export const WARNINGS_FLAG = "features.warnings";

const WARNING = parseTemplate(`!($cond) && println($$location + ": " + $msg)`);

export const warnMacro = defineMacro({
  name: "warn",
  params: ["any", "any"],
  description:
    "Print a located warning when the condition is false; removed unless features.warnings is set",
  expand(ctx, [cond, msg]) {
    if (!ctx.config.has(WARNINGS_FLAG)) {
      return EMPTY;
    }
    return materialize(WARNING, { cond, msg }, { location: ctx.locationString }, ctx.factory);
  },
});
