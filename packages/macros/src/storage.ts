/**
 * @storage - route a property through the instance's `_storage` map
 *
 * @example
 * ```typescript
 * class Settings {
 *   private _storage = new Map<string, unknown>();
 *   @storage theme: string;
 * }
 *
 * // Expands to:
 * class Settings {
 *   private _storage = new Map<string, unknown>();
 *   get theme(): string {
 *       return this._storage.get("theme") as string;
 *   }
 *   set theme(value: string) {
 *       this._storage.set("theme", value);
 *   }
 * }
 * ```
 */

import * as ts from "typescript";
import type { ExpansionContext } from "@hitch/core";
import { defineAttachedMacro } from "@hitch/core";
import { MACROS_MODULE, keptModifiers } from "./shared.js";

export const STORAGE_FIELD = "_storage";

function isAccessor(node: ts.Node): node is ts.AccessorDeclaration {
  return ts.isGetAccessorDeclaration(node) || ts.isSetAccessorDeclaration(node);
}

function expandStorage(
  ctx: ExpansionContext,
  property: ts.PropertyDeclaration
): readonly ts.AccessorDeclaration[] {
  if (!ts.isIdentifier(property.name)) {
    ctx.reportError(property.name, "@storage needs a plainly named property");
    return [];
  }
  if (property.initializer) {
    ctx.reportWarning(
      property.initializer,
      `@storage: the initializer of \`${property.name.text}\` is dropped; set it in the constructor instead`
    );
  }

  const name = property.name.text;
  const key = JSON.stringify(name);
  const type = property.type ? ctx.printNode(property.type) : "unknown";
  const modifiers = keptModifiers(property.modifiers, [ts.SyntaxKind.ReadonlyKeyword]);

  const getter =
    `${modifiers}get ${name}(): ${type} {\n` +
    `  return this.${STORAGE_FIELD}.get(${key}) as ${type};\n` +
    `}`;
  const setter =
    `${modifiers}set ${name}(value: ${type}) {\n` +
    `  this.${STORAGE_FIELD}.set(${key}, value);\n` +
    `}`;

  const hasReadonly = (property.modifiers ?? []).some((m) => m.kind === ts.SyntaxKind.ReadonlyKeyword);
  return ctx.parseMembers(hasReadonly ? getter : `${getter}\n${setter}`).filter(isAccessor);
}

export const storageMacro = defineAttachedMacro({
  name: "storage",
  module: MACROS_MODULE,
  description: "Replace a stored property with accessors backed by `_storage`",
  roles: [
    {
      kind: "accessor",
      expand: (ctx, _attribute, target) => expandStorage(ctx, target),
    },
  ],
});
