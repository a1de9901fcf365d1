/**
 * Macro Invoker - runs one expansion request against its target
 */

import * as ts from "typescript";
import type {
  AttachedDeclaration,
  DeclarationLookup,
  ExpansionRequest,
  ExpansionResult,
  RichDiagnostic,
  UniqueNameAllocator,
} from "@hitch/core";
import {
  DiagnosticBuilder,
  ExpansionContextImpl,
  HM4001,
  HM4002,
  HM9999,
  toFragments,
} from "@hitch/core";
import { isTypeDeclaration } from "./syntax.js";

export type InvocationOutcome =
  | { readonly success: true; readonly result: ExpansionResult }
  | { readonly success: false; readonly diagnostic: RichDiagnostic };

export interface InvocationTarget {
  readonly declaration: AttachedDeclaration;
  /** The member being offered, for member-attribute requests */
  readonly member?: AttachedDeclaration;
  /** Path reported to the macro and in diagnostics */
  readonly declarationPath: string;
  readonly lookup: DeclarationLookup;
  /** Located at when neither the attribute nor the declaration has a position */
  readonly anchor?: ts.Node;
}

export interface InvokerOptions {
  sourceFile: ts.SourceFile;
  allocator: UniqueNameAllocator;
  emit: (diagnostic: RichDiagnostic) => void;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Call the role's expansion function. Returns what the role needed instead
 * when the target is of the wrong kind.
 */
function dispatch(
  request: ExpansionRequest,
  ctx: ExpansionContextImpl,
  target: InvocationTarget
): readonly ts.Node[] | string {
  const { role, occurrence } = request;
  const { declaration, member } = target;
  const attribute = occurrence.attribute;

  switch (role.kind) {
    case "peer":
      return role.expand(ctx, attribute, declaration);

    case "member":
      if (!isTypeDeclaration(declaration)) return "a class or namespace";
      return role.expand(ctx, attribute, declaration);

    case "accessor":
      if (!ts.isPropertyDeclaration(declaration)) return "a stored property";
      return role.expand(ctx, attribute, declaration);

    case "memberAttribute":
      if (!isTypeDeclaration(declaration) || !member) {
        return "a class or namespace and one of its members";
      }
      return role.expand(ctx, attribute, declaration, member);
  }
}

export class MacroInvoker {
  constructor(private readonly options: InvokerOptions) {}

  invoke(request: ExpansionRequest, target: InvocationTarget): InvocationOutcome {
    const { sourceFile, allocator, emit } = this.options;
    const { occurrence, definition, role } = request;
    const attribute = occurrence.attribute;

    const ctx = new ExpansionContextImpl({
      sourceFile,
      macroName: definition.name,
      role: role.kind,
      declarationPath: target.declarationPath,
      allocator,
      lookup: target.lookup,
      report: (severity, node, message) => {
        new DiagnosticBuilder(HM4002, sourceFile, emit)
          .at(node, attribute, target.member, target.declaration, target.anchor)
          .in(target.declarationPath, definition.name)
          .withArgs({ message })
          .severity(severity)
          .emit();
      },
    });

    const mismatch = (expected: string): InvocationOutcome => ({
      success: false,
      diagnostic: new DiagnosticBuilder(HM9999, sourceFile, emit)
        .at(attribute, target.member, target.declaration, target.anchor)
        .in(target.declarationPath, definition.name)
        .withArgs({ message: `${role.kind} role of \`${definition.name}\` needs ${expected}` })
        .emit(),
    });

    try {
      const produced = dispatch(request, ctx, target);
      if (typeof produced === "string") return mismatch(produced);
      return { success: true, result: { request, fragments: toFragments(produced) } };
    } catch (error) {
      return {
        success: false,
        diagnostic: new DiagnosticBuilder(HM4001, sourceFile, emit)
          .at(attribute, target.member, target.declaration, target.anchor)
          .in(target.declarationPath, definition.name)
          .withArgs({ macro: definition.name, role: role.kind, error: describeError(error) })
          .emit(),
      };
    }
  }
}
