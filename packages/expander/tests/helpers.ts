/**
 * Shared helpers for expander tests
 */

import * as ts from "typescript";
import type { MacroDefinition, MacroRegistry, RichDiagnostic } from "@hitch/core";
import { createRegistry, declarationName } from "@hitch/core";
import { expandSourceFile, type ExpanderOptions, type UnitExpansion } from "@hitch/expander";

export function parse(code: string, fileName = "test.ts"): ts.SourceFile {
  return ts.createSourceFile(fileName, code, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
}

export function registryOf(...macros: MacroDefinition[]): MacroRegistry {
  const registry = createRegistry();
  for (const macro of macros) registry.register(macro);
  return registry;
}

export function expand(
  sourceFile: ts.SourceFile,
  registry: MacroRegistry,
  options: ExpanderOptions = {}
): UnitExpansion {
  return expandSourceFile(sourceFile, {
    registry,
    feedbackLimit: 100,
    unknownAttributes: "error",
    verbose: false,
    ...options,
  });
}

/** Identifier text of a declaration's name, or "?" */
export function nameOf(node: ts.Node): string {
  return declarationName(node) ?? "?";
}

export function topLevelNames(sourceFile: ts.SourceFile): string[] {
  return sourceFile.statements.map(nameOf);
}

export function classNamed(sourceFile: ts.SourceFile, name: string): ts.ClassDeclaration {
  for (const statement of sourceFile.statements) {
    if (ts.isClassDeclaration(statement) && statement.name?.text === name) return statement;
  }
  throw new Error(`no class ${name}`);
}

export function memberNames(sourceFile: ts.SourceFile, className: string): string[] {
  return classNamed(sourceFile, className).members.map(nameOf);
}

export function codes(diagnostics: readonly RichDiagnostic[]): number[] {
  return diagnostics.map((d) => d.code);
}

export function messages(diagnostics: readonly RichDiagnostic[]): string[] {
  return diagnostics.map((d) => d.message);
}
