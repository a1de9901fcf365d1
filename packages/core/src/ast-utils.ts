/**
 * Shared AST utility functions for the expander and macro implementations.
 */

import * as ts from "typescript";

// =============================================================================
// stripPositions — Mark AST nodes as synthetic
// =============================================================================

/**
 * Recursively mark AST nodes as synthetic by setting positions to -1.
 *
 * Nodes parsed from a scratch source file keep offsets into that file; the
 * printer would otherwise slice text out of whichever file it is printing.
 */
export function stripPositions<T extends ts.Node>(node: T): T {
  ts.setTextRange(node, { pos: -1, end: -1 });
  ts.forEachChild(node, (child) => {
    stripPositions(child);
  });
  return node;
}

// =============================================================================
// Parsing snippets
// =============================================================================

const SCRATCH_FILE = "__hitch_scratch__.ts";

function parseScratch(code: string, what: string): ts.SourceFile {
  const scratch = ts.createSourceFile(SCRATCH_FILE, code, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  const diagnostics: unknown = Reflect.get(scratch, "parseDiagnostics");
  if (Array.isArray(diagnostics) && diagnostics.length > 0) {
    throw new Error(`Failed to parse ${what}: ${code}`);
  }
  return scratch;
}

export function parseStatements(code: string): ts.Statement[] {
  const scratch = parseScratch(code, "statements");
  return Array.from(scratch.statements, (stmt) => stripPositions(stmt));
}

/** Parse class elements, e.g. `"x = 1; get y() { return 2; }"` */
export function parseMembers(code: string): ts.ClassElement[] {
  const scratch = parseScratch(`class __Members__ {\n${code}\n}`, "members");
  const [holder] = scratch.statements;
  if (holder === undefined || !ts.isClassDeclaration(holder)) {
    throw new Error(`Failed to parse members: ${code}`);
  }
  return Array.from(holder.members, (member) => stripPositions(member));
}

/** Parse one attribute, with or without its leading `@` */
export function parseAttribute(code: string): ts.Decorator {
  const text = code.trimStart().startsWith("@") ? code.trim() : `@${code.trim()}`;
  const scratch = parseScratch(`${text}\nclass __Attr__ {}`, "attribute");
  const [holder] = scratch.statements;
  const decorators = holder && ts.isClassDeclaration(holder) ? getAttributes(holder) : [];
  const [decorator] = decorators;
  if (decorator === undefined || decorators.length !== 1) {
    throw new Error(`Failed to parse attribute: ${code}`);
  }
  return stripPositions(decorator);
}

// =============================================================================
// Printing
// =============================================================================

let sharedPrinter: ts.Printer | undefined;
let dummySourceFile: ts.SourceFile | undefined;

export function getPrinter(): ts.Printer {
  return (sharedPrinter ??= ts.createPrinter({ newLine: ts.NewLineKind.LineFeed }));
}

function getDummySourceFile(): ts.SourceFile {
  return (dummySourceFile ??= ts.createSourceFile(
    "__hitch_print__.ts",
    "",
    ts.ScriptTarget.Latest,
    false,
    ts.ScriptKind.TS
  ));
}

/**
 * Print a node as source text. Pass the node's own source file when it still
 * has positions in it.
 */
export function printNode(node: ts.Node, sourceFile?: ts.SourceFile): string {
  return getPrinter().printNode(ts.EmitHint.Unspecified, node, sourceFile ?? getDummySourceFile());
}

// =============================================================================
// Declarations
// =============================================================================

/** Decorators in a modifier list, in source order */
export function decoratorsOf(modifiers: readonly ts.ModifierLike[] | undefined): ts.Decorator[] {
  return (modifiers ?? []).filter(ts.isDecorator);
}

/**
 * Attributes (decorators) of a declaration. Unlike `ts.getDecorators`, this
 * also reads the decorators the parser accepts on functions and namespaces.
 */
export function getAttributes(node: ts.Node): ts.Decorator[] {
  if (
    ts.isClassDeclaration(node) ||
    ts.isModuleDeclaration(node) ||
    ts.isFunctionDeclaration(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isPropertyDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  ) {
    return decoratorsOf(node.modifiers);
  }
  return [];
}

function propertyNameText(name: ts.PropertyName): string | undefined {
  if (
    ts.isIdentifier(name) ||
    ts.isPrivateIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name) ||
    ts.isNoSubstitutionTemplateLiteral(name)
  ) {
    return name.text;
  }
  return undefined;
}

function bindingNames(name: ts.BindingName, out: string[]): void {
  if (ts.isIdentifier(name)) {
    out.push(name.text);
    return;
  }
  for (const element of name.elements) {
    if (ts.isBindingElement(element)) bindingNames(element.name, out);
  }
}

/** The name a declaration is known by, if it has one */
export function declarationName(node: ts.Node): string | undefined {
  if (
    ts.isClassDeclaration(node) ||
    ts.isFunctionDeclaration(node) ||
    ts.isInterfaceDeclaration(node) ||
    ts.isTypeAliasDeclaration(node) ||
    ts.isEnumDeclaration(node)
  ) {
    return node.name?.text;
  }
  if (ts.isModuleDeclaration(node)) {
    return node.name.text;
  }
  if (
    ts.isMethodDeclaration(node) ||
    ts.isPropertyDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  ) {
    return propertyNameText(node.name);
  }
  return undefined;
}

/** Every name a declaration fragment brings into its scope */
export function introducedNames(node: ts.Node): string[] {
  if (ts.isVariableStatement(node)) {
    const out: string[] = [];
    for (const declaration of node.declarationList.declarations) {
      bindingNames(declaration.name, out);
    }
    return out;
  }
  if (ts.isImportDeclaration(node)) {
    const clause = node.importClause;
    if (!clause) return [];
    const out: string[] = clause.name ? [clause.name.text] : [];
    const bindings = clause.namedBindings;
    if (bindings && ts.isNamespaceImport(bindings)) out.push(bindings.name.text);
    if (bindings && ts.isNamedImports(bindings)) {
      out.push(...bindings.elements.map((element) => element.name.text));
    }
    return out;
  }
  const name = declarationName(node);
  return name === undefined ? [] : [name];
}

function hasModifier(node: ts.PropertyDeclaration | ts.VariableStatement, kind: ts.SyntaxKind): boolean {
  return (node.modifiers ?? []).some((modifier) => modifier.kind === kind);
}

/** An instance property that owns storage */
export function isStoredProperty(node: ts.Node): node is ts.PropertyDeclaration {
  return (
    ts.isPropertyDeclaration(node) &&
    !hasModifier(node, ts.SyntaxKind.StaticKeyword) &&
    !hasModifier(node, ts.SyntaxKind.AbstractKeyword) &&
    !hasModifier(node, ts.SyntaxKind.DeclareKeyword)
  );
}

/**
 * Whether a fragment allocates storage in its container: any property with a
 * value slot, static ones included, or a variable statement of a namespace
 */
export function introducesStorage(node: ts.Node): boolean {
  if (ts.isPropertyDeclaration(node)) {
    return (
      !hasModifier(node, ts.SyntaxKind.AbstractKeyword) &&
      !hasModifier(node, ts.SyntaxKind.DeclareKeyword)
    );
  }
  return ts.isVariableStatement(node) && !hasModifier(node, ts.SyntaxKind.DeclareKeyword);
}
