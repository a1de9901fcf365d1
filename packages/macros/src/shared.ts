/**
 * Helpers shared by the standard macros
 */

import * as ts from "typescript";
import type { AttachedDeclaration } from "@hitch/core";
import { decoratorsOf } from "@hitch/core";

/** Module the standard macros are exported from */
export const MACROS_MODULE = "@hitch/macros";

/** Identifier name of a declaration, if it has a plain one */
export function simpleName(node: AttachedDeclaration): string | undefined {
  const name = node.name;
  return name && ts.isIdentifier(name) ? name.text : undefined;
}

/** Whether a declaration carries `@name` or `@name(...)` */
export function hasAttribute(node: AttachedDeclaration, name: string): boolean {
  return decoratorsOf(node.modifiers).some((decorator) => {
    const expr = decorator.expression;
    const callee = ts.isCallExpression(expr) ? expr.expression : expr;
    return ts.isIdentifier(callee) && callee.text === name;
  });
}

/** Modifiers to carry over to a generated declaration, as source text */
export function keptModifiers(
  modifiers: readonly ts.ModifierLike[] | undefined,
  drop: readonly ts.SyntaxKind[]
): string {
  const kept = (modifiers ?? []).filter(
    (m): m is ts.Modifier => !ts.isDecorator(m) && !drop.includes(m.kind)
  );
  return kept.map((m) => `${ts.tokenToString(m.kind) ?? ""} `).join("");
}
