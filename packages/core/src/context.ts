/**
 * ExpansionContext Implementation - What a macro sees while it expands
 */

import * as ts from "typescript";
import type {
  DeclarationLookup,
  ExpansionContext,
  MemberInfo,
  RoleKind,
  StoredPropertyInfo,
} from "./types.js";
import type { UniqueNameAllocator } from "./hygiene.js";
import { parseAttribute, parseMembers, parseStatements, printNode } from "./ast-utils.js";

export type ContextReporter = (
  severity: "error" | "warning",
  node: ts.Node | undefined,
  message: string
) => void;

export interface ExpansionContextOptions {
  sourceFile: ts.SourceFile;
  macroName: string;
  role: RoleKind;
  declarationPath: string;
  allocator: UniqueNameAllocator;
  /** Reads of the enclosing type; the expander records each call */
  lookup: DeclarationLookup;
  report: ContextReporter;
  factory?: ts.NodeFactory;
}

export class ExpansionContextImpl implements ExpansionContext {
  readonly sourceFile: ts.SourceFile;
  readonly factory: ts.NodeFactory;
  readonly macroName: string;
  readonly role: RoleKind;
  readonly declarationPath: string;

  private readonly allocator: UniqueNameAllocator;
  private readonly lookup: DeclarationLookup;
  private readonly report: ContextReporter;

  constructor(options: ExpansionContextOptions) {
    this.sourceFile = options.sourceFile;
    this.factory = options.factory ?? ts.factory;
    this.macroName = options.macroName;
    this.role = options.role;
    this.declarationPath = options.declarationPath;
    this.allocator = options.allocator;
    this.lookup = options.lookup;
    this.report = options.report;
  }

  makeUniqueName(base: string): string {
    return this.allocator.allocate(base);
  }

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  reportError(node: ts.Node | undefined, message: string): void {
    this.report("error", node, message);
  }

  reportWarning(node: ts.Node | undefined, message: string): void {
    this.report("warning", node, message);
  }

  // -------------------------------------------------------------------------
  // Declaration reads
  // -------------------------------------------------------------------------

  storedProperties(): readonly StoredPropertyInfo[] {
    return this.lookup.storedProperties();
  }

  members(): readonly MemberInfo[] {
    return this.lookup.members();
  }

  // -------------------------------------------------------------------------
  // Syntax
  // -------------------------------------------------------------------------

  parseStatements(code: string): ts.Statement[] {
    return parseStatements(code);
  }

  parseMembers(code: string): ts.ClassElement[] {
    return parseMembers(code);
  }

  parseAttribute(code: string): ts.Decorator {
    return parseAttribute(code);
  }

  /** Nodes from the unit keep their text; synthesized ones print from structure */
  printNode(node: ts.Node): string {
    return printNode(node, this.sourceFile);
  }
}
