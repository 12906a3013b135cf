/**
 * Error taxonomy. Each error carries the catalog code it is reported under;
 * a no-match at a call site is a value, never one of these.
 */

import {
  formatMessage,
  SM1001,
  SM1002,
  SM1003,
  SM2001,
  SM2002,
  SM3001,
  SM3002,
  SM4001,
  type DiagnosticDescriptor,
  type MacroDiagnostic,
} from "./diagnostics.js";
import type { MacroSignature, SourceSpan } from "./types.js";

export interface MacroErrorDetails {
  macroName?: string;
  span?: SourceSpan;
  cause?: unknown;
}

export class MacroError extends Error {
  readonly code: string;
  private _macroName: string | undefined;
  private _span: SourceSpan | undefined;

  constructor(descriptor: DiagnosticDescriptor, message: string, details: MacroErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = new.target.name;
    this.code = descriptor.code;
    this._macroName = details.macroName;
    this._span = details.span;
  }

  get macroName(): string | undefined {
    return this._macroName;
  }

  get span(): SourceSpan | undefined {
    return this._span;
  }

  /**
   * Fill in the macro and call site an error was raised under, keeping
   * whatever the error already knew.
   */
  attachCallSite(macroName: string, span: SourceSpan | undefined): this {
    this._macroName ??= macroName;
    this._span ??= span;
    return this;
  }

  toDiagnostic(unit?: string): MacroDiagnostic {
    return {
      code: this.code,
      severity: "error",
      message: this.message,
      macroName: this.macroName,
      span: this.span,
      unit,
    };
  }
}

export function describeSignature(signature: MacroSignature): string {
  return `${signature.name}(${signature.params.join(", ")})`;
}

export class DuplicateSignatureError extends MacroError {
  constructor(
    readonly signature: MacroSignature,
    origin?: string,
  ) {
    super(
      SM1001,
      formatMessage(SM1001, {
        signature: describeSignature(signature),
        origin: origin ? ` (by ${origin})` : "",
      }),
      { macroName: signature.name },
    );
  }
}

export class RegistryFrozenError extends MacroError {
  constructor(readonly signature: MacroSignature) {
    super(SM1002, formatMessage(SM1002, { signature: describeSignature(signature) }), {
      macroName: signature.name,
    });
  }
}

export class MacroDeclarationError extends MacroError {
  constructor(name: string, reason: string, span?: SourceSpan) {
    super(SM1003, formatMessage(SM1003, { name, reason }), { macroName: name, span });
  }
}

export class MacroExecutionError extends MacroError {
  constructor(macroName: string, span: SourceSpan | undefined, reason: string, cause?: unknown) {
    super(SM2001, formatMessage(SM2001, { reason }), { macroName, span, cause });
  }
}

export class RecursionLimitError extends MacroError {
  constructor(
    macroName: string,
    span: SourceSpan | undefined,
    readonly limit: number,
  ) {
    super(SM2002, formatMessage(SM2002, { limit }), { macroName, span });
  }
}

export class UnresolvedHoleError extends MacroError {
  constructor(readonly holes: readonly string[]) {
    super(SM3001, formatMessage(SM3001, { holes: holes.join(", ") }));
  }
}

export class TemplateSyntaxError extends MacroError {
  constructor(reason: string) {
    super(SM3002, formatMessage(SM3002, { reason }));
  }
}

export class ConfigAccessError extends MacroError {
  constructor(path: string) {
    super(SM4001, formatMessage(SM4001, { path }));
  }
}
