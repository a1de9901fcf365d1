/**
 * @equatable - default `equals` comparing every stored property
 *
 * Runs after the other expansions of its declaration, so properties added
 * by other macros are compared too. A hand-written `equals` is left alone.
 */

import * as ts from "typescript";
import type { DeclarationFragment, ExpansionContext, TypeDeclaration } from "@hitch/core";
import { defineAttachedMacro, names } from "@hitch/core";
import { MACROS_MODULE } from "./shared.js";

function selfType(ctx: ExpansionContext, target: TypeDeclaration): string {
  if (!ts.isClassDeclaration(target) || !target.name) return "this";
  const params = target.typeParameters?.map((p) => ctx.printNode(p.name)) ?? [];
  return params.length > 0 ? `${target.name.text}<${params.join(", ")}>` : target.name.text;
}

function expandEquatable(
  ctx: ExpansionContext,
  target: TypeDeclaration
): readonly DeclarationFragment[] {
  const comparisons = ctx
    .storedProperties()
    .map((p) => `this.${p.name} === other.${p.name}`);
  const body = comparisons.length > 0 ? comparisons.join(" && ") : "true";

  return ctx.parseMembers(
    `equals(other: ${selfType(ctx, target)}): boolean {\n` +
      `  return ${body};\n` +
      `}`
  );
}

export const equatableMacro = defineAttachedMacro({
  name: "equatable",
  module: MACROS_MODULE,
  description: "Synthesize `equals` from the stored properties unless the class defines one",
  roles: [
    {
      kind: "member",
      defaultWitness: true,
      names: [names.named("equals")],
      validTargets: ["class"],
      expand: (ctx, _attribute, target) => expandEquatable(ctx, target),
    },
  ],
});
