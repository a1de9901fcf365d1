/**
 * @completionHandler - callback overload for async functions
 *
 * Adds a non-async overload next to an async function or method. The
 * overload takes a trailing `completionHandler` and forwards the result of
 * the original call to it.
 *
 * @example
 * ```typescript
 * import { completionHandler } from "@hitch/macros";
 *
 * @completionHandler
 * async function fetchUser(id: string): Promise<User> { ... }
 *
 * // Expands to an additional:
 * function fetchUser(id: string, completionHandler: (result: User) => void) {
 *     fetchUser(id).then(completionHandler);
 * }
 * ```
 */

import * as ts from "typescript";
import type { AttachedDeclaration, DeclarationFragment, ExpansionContext } from "@hitch/core";
import { defineAttachedMacro, names } from "@hitch/core";
import { MACROS_MODULE, keptModifiers, simpleName } from "./shared.js";

const HANDLER = "completionHandler";

/** `T` from a `Promise<T>` annotation */
function resultType(ctx: ExpansionContext, type: ts.TypeNode | undefined): string | undefined {
  if (!type) return "unknown";
  if (
    ts.isTypeReferenceNode(type) &&
    ts.isIdentifier(type.typeName) &&
    type.typeName.text === "Promise" &&
    type.typeArguments?.length === 1
  ) {
    const [inner] = type.typeArguments;
    return inner ? ctx.printNode(inner) : undefined;
  }
  return undefined;
}

function expandCompletionHandler(
  ctx: ExpansionContext,
  target: AttachedDeclaration
): readonly DeclarationFragment[] {
  if (!ts.isFunctionDeclaration(target) && !ts.isMethodDeclaration(target)) {
    ctx.reportError(target, "@completionHandler can only be attached to async functions and methods");
    return [];
  }

  const name = simpleName(target);
  if (name === undefined) {
    ctx.reportError(target, "@completionHandler needs a named function");
    return [];
  }

  const result = resultType(ctx, target.type);
  if (result === undefined) {
    ctx.reportError(target.type, `@completionHandler: \`${name}\` must return Promise<T>`);
    return [];
  }

  const params = Array.from(target.parameters);
  const rest = params.find((p) => p.dotDotDotToken);
  if (rest) {
    ctx.reportError(rest, "@completionHandler cannot append a handler after a rest parameter");
    return [];
  }
  if (params.some((p) => ts.isIdentifier(p.name) && p.name.text === HANDLER)) {
    ctx.reportError(target, `@completionHandler: \`${name}\` already has a \`${HANDLER}\` parameter`);
    return [];
  }

  const args: string[] = [];
  for (const param of params) {
    if (!ts.isIdentifier(param.name)) {
      ctx.reportError(param, "@completionHandler does not support destructured parameters");
      return [];
    }
    args.push(param.name.text);
  }

  const signature = [...params.map((p) => ctx.printNode(p)), `${HANDLER}: (result: ${result}) => void`];
  const modifiers = keptModifiers(target.modifiers, [ts.SyntaxKind.AsyncKeyword]);

  if (ts.isFunctionDeclaration(target)) {
    return ctx.parseStatements(
      `${modifiers}function ${name}(${signature.join(", ")}) {\n` +
        `  ${name}(${args.join(", ")}).then(${HANDLER});\n` +
        `}`
    );
  }

  return ctx.parseMembers(
    `${modifiers}${name}(${signature.join(", ")}) {\n` +
      `  this.${name}(${args.join(", ")}).then(${HANDLER});\n` +
      `}`
  );
}

export const completionHandlerMacro = defineAttachedMacro({
  name: "completionHandler",
  module: MACROS_MODULE,
  description: "Add a callback-taking overload next to an async function or method",
  roles: [
    {
      kind: "peer",
      names: [names.overloaded],
      validTargets: ["async-function", "async-method"],
      expand: (ctx, _attribute, target) => expandCompletionHandler(ctx, target),
    },
  ],
});
