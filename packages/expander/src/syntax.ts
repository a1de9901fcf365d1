/**
 * Syntax helpers over the TypeScript AST: positions, attributes and
 * copy-with-replacement of declarations.
 */

import * as ts from "typescript";
import type { AttachedDeclaration, DeclarationPosition, TypeDeclaration } from "@hitch/core";
import { decoratorsOf } from "@hitch/core";

// =============================================================================
// Declaration kinds
// =============================================================================

export function isTypeDeclaration(node: ts.Node): node is TypeDeclaration {
  return ts.isClassDeclaration(node) || isNamespaceDeclaration(node);
}

/** `namespace N { ... }`; ambient `declare module "x"` and dotted `A.B` heads don't count */
export function isNamespaceDeclaration(node: ts.Node): node is ts.ModuleDeclaration {
  return (
    ts.isModuleDeclaration(node) &&
    ts.isIdentifier(node.name) &&
    node.body !== undefined &&
    ts.isModuleBlock(node.body)
  );
}

export function isAttachedDeclaration(node: ts.Node): node is AttachedDeclaration {
  return (
    ts.isClassDeclaration(node) ||
    isNamespaceDeclaration(node) ||
    ts.isFunctionDeclaration(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isPropertyDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  );
}

function isAsync(modifiers: readonly ts.ModifierLike[] | undefined): boolean {
  return (modifiers ?? []).some((m) => m.kind === ts.SyntaxKind.AsyncKeyword);
}

export function positionOf(node: AttachedDeclaration): DeclarationPosition {
  if (ts.isClassDeclaration(node)) return "class";
  if (ts.isModuleDeclaration(node)) return "namespace";
  if (ts.isFunctionDeclaration(node)) return isAsync(node.modifiers) ? "async-function" : "function";
  if (ts.isMethodDeclaration(node)) return isAsync(node.modifiers) ? "async-method" : "method";
  if (ts.isPropertyDeclaration(node)) return "stored-property";
  return "computed-property";
}

/** Readable position name for messages */
export function describePosition(position: DeclarationPosition): string {
  return position.replace("-", " ");
}

const STATEMENT_DECLARATIONS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.FunctionDeclaration,
  ts.SyntaxKind.ClassDeclaration,
  ts.SyntaxKind.InterfaceDeclaration,
  ts.SyntaxKind.TypeAliasDeclaration,
  ts.SyntaxKind.EnumDeclaration,
  ts.SyntaxKind.ModuleDeclaration,
  ts.SyntaxKind.ImportEqualsDeclaration,
  ts.SyntaxKind.ImportDeclaration,
  ts.SyntaxKind.ExportAssignment,
  ts.SyntaxKind.ExportDeclaration,
]);

/** Whether a node can stand in a statement list */
export function isStatementNode(node: ts.Node): node is ts.Statement {
  return (
    (node.kind >= ts.SyntaxKind.FirstStatement && node.kind <= ts.SyntaxKind.LastStatement) ||
    STATEMENT_DECLARATIONS.has(node.kind)
  );
}

// Reverse mapping that skips the First*/Last* range markers aliasing real kinds
const KIND_NAMES = new Map<number, string>();
for (const [name, value] of Object.entries(ts.SyntaxKind)) {
  if (typeof value !== "number" || /^(First|Last)/.test(name)) continue;
  if (!KIND_NAMES.has(value)) KIND_NAMES.set(value, name);
}

export function syntaxKindName(node: ts.Node): string {
  return KIND_NAMES.get(node.kind) ?? `SyntaxKind${node.kind}`;
}

// =============================================================================
// Attributes
// =============================================================================

export interface ParsedAttribute {
  readonly macroName: string;
  /** `ns` in `@ns.name` */
  readonly qualifier?: string;
  readonly args: readonly ts.Expression[];
}

/**
 * Split an attribute into its parts. Accepts `@name`, `@name(args)`,
 * `@ns.name` and `@ns.name(args)`; anything else is not a macro attribute.
 */
export function parseDecorator(decorator: ts.Decorator): ParsedAttribute | undefined {
  const expr = decorator.expression;
  const callee = ts.isCallExpression(expr) ? expr.expression : expr;
  const args = ts.isCallExpression(expr) ? Array.from(expr.arguments) : [];

  if (ts.isIdentifier(callee)) {
    return { macroName: callee.text, args };
  }

  if (
    ts.isPropertyAccessExpression(callee) &&
    ts.isIdentifier(callee.expression) &&
    ts.isIdentifier(callee.name)
  ) {
    return { macroName: callee.name.text, qualifier: callee.expression.text, args };
  }

  return undefined;
}

// =============================================================================
// Copy with replacement
// =============================================================================

function replaceDecorators(
  modifiers: readonly ts.ModifierLike[] | undefined,
  decorators: readonly ts.Decorator[]
): ts.ModifierLike[] | undefined {
  const rest = (modifiers ?? []).filter((m) => !ts.isDecorator(m));
  const next = [...decorators, ...rest];
  return next.length > 0 ? next : undefined;
}

/** Replace a declaration's attribute list, keeping its other modifiers */
export function withAttributes(
  node: ts.ClassDeclaration,
  decorators: readonly ts.Decorator[]
): ts.ClassDeclaration;
export function withAttributes(
  node: TypeDeclaration,
  decorators: readonly ts.Decorator[]
): TypeDeclaration;
export function withAttributes(
  node: AttachedDeclaration,
  decorators: readonly ts.Decorator[]
): AttachedDeclaration;
export function withAttributes(
  node: AttachedDeclaration,
  decorators: readonly ts.Decorator[]
): AttachedDeclaration {
  const factory = ts.factory;
  const modifiers = replaceDecorators(node.modifiers, decorators);

  if (ts.isClassDeclaration(node)) {
    return factory.updateClassDeclaration(
      node,
      modifiers,
      node.name,
      node.typeParameters,
      node.heritageClauses,
      node.members
    );
  }

  if (ts.isModuleDeclaration(node)) {
    return factory.updateModuleDeclaration(node, modifiers, node.name, node.body);
  }

  if (ts.isFunctionDeclaration(node)) {
    return factory.updateFunctionDeclaration(
      node,
      modifiers,
      node.asteriskToken,
      node.name,
      node.typeParameters,
      node.parameters,
      node.type,
      node.body
    );
  }

  if (ts.isMethodDeclaration(node)) {
    return factory.updateMethodDeclaration(
      node,
      modifiers,
      node.asteriskToken,
      node.name,
      node.questionToken,
      node.typeParameters,
      node.parameters,
      node.type,
      node.body
    );
  }

  if (ts.isPropertyDeclaration(node)) {
    return factory.updatePropertyDeclaration(
      node,
      modifiers,
      node.name,
      node.questionToken ?? node.exclamationToken,
      node.type,
      node.initializer
    );
  }

  if (ts.isGetAccessorDeclaration(node)) {
    return factory.updateGetAccessorDeclaration(
      node,
      modifiers,
      node.name,
      node.parameters,
      node.type,
      node.body
    );
  }

  return factory.updateSetAccessorDeclaration(node, modifiers, node.name, node.parameters, node.body);
}

/** Replace a type's member list */
export function withMembers(node: TypeDeclaration, members: readonly ts.Node[]): TypeDeclaration {
  const factory = ts.factory;

  if (ts.isClassDeclaration(node)) {
    return factory.updateClassDeclaration(
      node,
      node.modifiers,
      node.name,
      node.typeParameters,
      node.heritageClauses,
      members.filter(ts.isClassElement)
    );
  }

  const body = node.body && ts.isModuleBlock(node.body) ? node.body : factory.createModuleBlock([]);
  return factory.updateModuleDeclaration(
    node,
    node.modifiers,
    node.name,
    factory.updateModuleBlock(body, members.filter(isStatementNode))
  );
}

/** Current members of a type, in order */
export function membersOf(node: TypeDeclaration): readonly ts.Node[] {
  if (ts.isClassDeclaration(node)) return node.members;
  return node.body && ts.isModuleBlock(node.body) ? node.body.statements : [];
}

export function attributesOf(node: AttachedDeclaration): ts.Decorator[] {
  return decoratorsOf(node.modifiers);
}
