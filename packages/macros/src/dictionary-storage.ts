/**
 * @dictionaryStorage - keep every stored property of a class in one map
 *
 * Adds a `_storage` map to the class and attaches `@storage` to each stored
 * property, which then expands to accessors reading and writing the map.
 */

import * as ts from "typescript";
import { defineAttachedMacro, isStoredProperty, names } from "@hitch/core";
import { MACROS_MODULE, hasAttribute } from "./shared.js";
import { STORAGE_FIELD } from "./storage.js";

export const dictionaryStorageMacro = defineAttachedMacro({
  name: "dictionaryStorage",
  module: MACROS_MODULE,
  description: "Store all properties of a class in a single `_storage` map",
  roles: [
    {
      kind: "member",
      names: [names.named(STORAGE_FIELD)],
      validTargets: ["class"],
      expand: (ctx) => {
        if (ctx.members().some((m) => m.name === STORAGE_FIELD)) return [];
        return ctx.parseMembers(`private ${STORAGE_FIELD} = new Map<string, unknown>();`);
      },
    },
    {
      kind: "memberAttribute",
      validTargets: ["class"],
      expand: (ctx, _attribute, _type, member) => {
        if (!isStoredProperty(member)) return [];
        if (ts.isIdentifier(member.name) && member.name.text === STORAGE_FIELD) return [];
        if (hasAttribute(member, "storage")) return [];
        return [ctx.parseAttribute("@storage")];
      },
    },
  ],
});
