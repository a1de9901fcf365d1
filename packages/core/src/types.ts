/**
 * Core types for the attached-macro system
 */

import type * as ts from "typescript";

// ============================================================================
// Roles
// ============================================================================

export type RoleKind = "peer" | "member" | "accessor" | "memberAttribute";

/**
 * Fixed execution order across role kinds on one declaration.
 *
 * Member attributes come first: they must land on each member before that
 * member's own attributes are resolved.
 */
export const ROLE_EXECUTION_ORDER: readonly RoleKind[] = [
  "memberAttribute",
  "member",
  "peer",
  "accessor",
] as const;

// ============================================================================
// Syntactic Positions
// ============================================================================

export type DeclarationPosition =
  | "class"
  | "namespace"
  | "function"
  | "async-function"
  | "method"
  | "async-method"
  | "stored-property"
  | "computed-property";

/** Declarations an attribute can be attached to */
export type AttachedDeclaration =
  | ts.ClassDeclaration
  | ts.ModuleDeclaration
  | ts.FunctionDeclaration
  | ts.MethodDeclaration
  | ts.PropertyDeclaration
  | ts.GetAccessorDeclaration
  | ts.SetAccessorDeclaration;

/** Declarations that own a member list */
export type TypeDeclaration = ts.ClassDeclaration | ts.ModuleDeclaration;

/** A syntax fragment a peer or member role may introduce */
export type DeclarationFragment = ts.Statement | ts.ClassElement;

// ============================================================================
// Name Policies
// ============================================================================

export type NamePattern =
  | { readonly kind: "overloaded" }
  | { readonly kind: "prefixed"; readonly prefix: string }
  | { readonly kind: "suffixed"; readonly suffix: string }
  | { readonly kind: "named"; readonly name: string }
  | { readonly kind: "arbitrary" };

const overloaded: NamePattern = { kind: "overloaded" };
const arbitrary: NamePattern = { kind: "arbitrary" };

/** Pattern constructors, mirroring how roles spell their names */
export const names = {
  overloaded,
  arbitrary,
  prefixed: (prefix: string): NamePattern => ({ kind: "prefixed", prefix }),
  suffixed: (suffix: string): NamePattern => ({ kind: "suffixed", suffix }),
  named: (name: string): NamePattern => ({ kind: "named", name }),
} as const;

// ============================================================================
// Role Specifications
// ============================================================================

interface RoleSpecBase {
  /**
   * Names this role may introduce. Names handed out by
   * `ExpansionContext.makeUniqueName` are always permitted.
   */
  readonly names?: readonly NamePattern[];

  /** Narrows the positions this role applies to */
  readonly validTargets?: readonly DeclarationPosition[];
}

/** Introduces sibling declarations next to the target */
export interface PeerRole extends RoleSpecBase {
  readonly kind: "peer";
  expand(
    ctx: ExpansionContext,
    attribute: ts.Decorator,
    target: AttachedDeclaration
  ): readonly DeclarationFragment[];
}

/** Introduces members into the target type */
export interface MemberRole extends RoleSpecBase {
  readonly kind: "member";

  /**
   * A default-witness role runs after every other expansion of its batch,
   * never adds stored properties, and only fills in members that do not
   * exist yet.
   */
  readonly defaultWitness?: boolean;

  expand(
    ctx: ExpansionContext,
    attribute: ts.Decorator,
    target: TypeDeclaration
  ): readonly DeclarationFragment[];
}

/** Replaces a stored property with accessors */
export interface AccessorRole extends RoleSpecBase {
  readonly kind: "accessor";
  expand(
    ctx: ExpansionContext,
    attribute: ts.Decorator,
    target: ts.PropertyDeclaration
  ): readonly ts.AccessorDeclaration[];
}

/** Adds attributes to each member of the target type */
export interface MemberAttributeRole extends RoleSpecBase {
  readonly kind: "memberAttribute";
  expand(
    ctx: ExpansionContext,
    attribute: ts.Decorator,
    target: TypeDeclaration,
    member: AttachedDeclaration
  ): readonly ts.Decorator[];
}

export type RoleSpec = PeerRole | MemberRole | AccessorRole | MemberAttributeRole;

// ============================================================================
// Macro Definitions
// ============================================================================

export interface MacroDefinition {
  /** Name the attribute is spelled with */
  readonly name: string;

  /** Optional description for documentation */
  readonly description?: string;

  /**
   * Module that exports the macro. When set, the macro is only visible in
   * units that import from this module.
   */
  readonly module?: string;

  readonly genericParameters?: readonly string[];

  readonly roles: readonly RoleSpec[];
}

export interface MacroRegistry {
  /** Register a definition; throws MacroDefinitionError on an invalid role set */
  register(definition: MacroDefinition): void;

  /** Every definition registered under a name, across modules */
  lookup(name: string): readonly MacroDefinition[];

  /** Roles of the definition with the given name (and module) */
  lookupRoles(name: string, module?: string): ReadonlySet<RoleSpec> | undefined;

  getAll(): readonly MacroDefinition[];

  clear(): void;
}

// ============================================================================
// Expansion
// ============================================================================

export interface AttributeOccurrence {
  /** Path of the declaration carrying the attribute, e.g. "Store.items" */
  readonly declarationPath: string;
  readonly attribute: ts.Decorator;
  readonly macroName: string;
  /** Namespace qualifier for `@ns.name` */
  readonly qualifier?: string;
  readonly arguments: readonly ts.Expression[];
  /** Source order among the declaration's attributes */
  readonly index: number;
}

export interface ExpansionRequest {
  readonly occurrence: AttributeOccurrence;
  readonly definition: MacroDefinition;
  readonly role: RoleSpec;
}

export interface Fragment {
  readonly node: ts.Node;
  /** Names the fragment introduces into its scope */
  readonly names: readonly string[];
}

export interface ExpansionResult {
  readonly request: ExpansionRequest;
  readonly fragments: readonly Fragment[];
}

export interface DependencyEdge {
  /** Declaration whose expansion produces the data */
  readonly from: string;
  /** Declaration whose expansion reads it */
  readonly to: string;
  readonly reason: string;
}

export interface StoredPropertyInfo {
  readonly name: string;
  /** Printed type annotation, if any */
  readonly type?: string;
  readonly optional: boolean;
  readonly hasInitializer: boolean;
  readonly node: ts.PropertyDeclaration;
}

export type MemberKind =
  | "property"
  | "method"
  | "accessor"
  | "constructor"
  | "class"
  | "namespace"
  | "function"
  | "other";

export interface MemberInfo {
  readonly name: string | undefined;
  readonly kind: MemberKind;
  readonly node: ts.Node;
}

/**
 * Reads of other declarations. Every read is recorded as a dependency of the
 * requesting expansion.
 */
export interface DeclarationLookup {
  storedProperties(): readonly StoredPropertyInfo[];
  members(): readonly MemberInfo[];
}

/** Everything a macro implementation may touch while expanding */
export interface ExpansionContext {
  readonly sourceFile: ts.SourceFile;
  readonly factory: ts.NodeFactory;
  readonly macroName: string;
  readonly role: RoleKind;
  readonly declarationPath: string;

  /** A fresh identifier text, unique within the compilation run */
  makeUniqueName(base: string): string;

  reportError(node: ts.Node | undefined, message: string): void;
  reportWarning(node: ts.Node | undefined, message: string): void;

  /** Stored properties of the type the expansion belongs to */
  storedProperties(): readonly StoredPropertyInfo[];

  /** Members of the type the expansion belongs to */
  members(): readonly MemberInfo[];

  parseStatements(code: string): ts.Statement[];
  parseMembers(code: string): ts.ClassElement[];
  parseAttribute(code: string): ts.Decorator;

  /** Print a node as source text */
  printNode(node: ts.Node): string;
}
