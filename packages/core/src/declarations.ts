/**
 * Macro declaration surface
 *
 * Library authors can declare macros as ordinary functions tagged `@macro`:
 *
 * ```typescript
 * /** @macro *\/
 * export function warn(ctx: MacroContext, cond: Expr, msg: Expr): ReplacementResult { ... }
 * ```
 *
 * The first parameter is the context slot and is never matched. The
 * declared types of the others map to parameter shapes through a fixed
 * table.
 */

import ts from "typescript";
import { printNode } from "./ast-utils.js";
import { MacroDeclarationError } from "./errors.js";
import type { LocationTable } from "./location.js";
import type {
  MacroDefinition,
  MacroImplementation,
  MacroRegistry,
  MacroSignature,
  ParameterShape,
} from "./types.js";

export const CONTEXT_TYPE_NAME = "MacroContext";

/** Declared parameter type name → parameter shape. */
export const DECLARED_TYPE_SHAPES: ReadonlyMap<string, ParameterShape> = new Map<
  string,
  ParameterShape
>([
  ["Expr", "any"],
  ["LiteralExpr", "literal"],
  ["LambdaExpr", "lambda"],
  ["CallExpr", "call"],
  ["IdentifierExpr", "identifier"],
  ["BinaryExpr", "binary"],
]);

export interface MacroDeclaration {
  readonly signature: MacroSignature;
  readonly node: ts.FunctionDeclaration;
}

function hasMacroTag(node: ts.Node): boolean {
  return ts.getJSDocTags(node).some((tag) => tag.tagName.text === "macro");
}

/** Type name of a simple (possibly qualified) type reference. */
function typeName(type: ts.TypeNode | undefined): string | undefined {
  if (!type || !ts.isTypeReferenceNode(type) || type.typeArguments) return undefined;
  return ts.isIdentifier(type.typeName) ? type.typeName.text : type.typeName.right.text;
}

/**
 * Read the signature of one `@macro` function declaration.
 */
export function signatureFromDeclaration(
  node: ts.FunctionDeclaration,
  locations?: LocationTable,
): MacroSignature {
  const name = node.name?.text;
  const span = locations?.locate(node);
  if (!name) {
    throw new MacroDeclarationError("<anonymous>", "a macro function must be named", span);
  }

  const [context, ...rest] = node.parameters;
  if (!context || typeName(context.type) !== CONTEXT_TYPE_NAME) {
    throw new MacroDeclarationError(
      name,
      `the first parameter must be typed ${CONTEXT_TYPE_NAME}`,
      span,
    );
  }

  const params = rest.map((param) => {
    const paramName = ts.isIdentifier(param.name) ? param.name.text : "<pattern>";
    if (param.questionToken || param.dotDotDotToken || param.initializer) {
      throw new MacroDeclarationError(
        name,
        `parameter '${paramName}' cannot be optional or variadic`,
        span,
      );
    }
    const declared = typeName(param.type);
    const shape = declared === undefined ? undefined : DECLARED_TYPE_SHAPES.get(declared);
    if (!shape) {
      const typeText = param.type ? printNode(param.type) : "<none>";
      throw new MacroDeclarationError(
        name,
        `parameter '${paramName}' has unsupported type '${typeText}'`,
        span,
      );
    }
    return shape;
  });

  return { name, params };
}

/**
 * Find every `@macro` function declared at the top level of a source file.
 */
export function collectMacroDeclarations(
  sourceFile: ts.SourceFile,
  locations?: LocationTable,
): MacroDeclaration[] {
  return sourceFile.statements
    .filter(ts.isFunctionDeclaration)
    .filter(hasMacroTag)
    .map((node) => ({ signature: signatureFromDeclaration(node, locations), node }));
}

/**
 * Register the declared macros of a source file, pairing each declaration
 * with the implementation of the same name. Declarations sharing a name
 * (overloads) share the implementation.
 */
export function registerDeclaredMacros(
  registry: MacroRegistry,
  sourceFile: ts.SourceFile,
  implementations: Readonly<Record<string, MacroImplementation>>,
  origin?: string,
): MacroDefinition[] {
  return collectMacroDeclarations(sourceFile).map(({ signature }) => {
    const implementation = implementations[signature.name];
    if (!implementation) {
      throw new MacroDeclarationError(signature.name, "no implementation was provided");
    }
    return registry.register(signature, implementation, { origin: origin ?? sourceFile.fileName });
  });
}
