/**
 * Scope tree - the staging mirror a batch expands into.
 *
 * Each entry holds the current version of one declaration. Types keep their
 * members as child entries, so fragments can be inserted, replaced and
 * re-attributed without rebuilding the whole tree each time. The final nodes
 * are rebuilt once, by `materialize`, when the batch commits.
 */

import * as ts from "typescript";
import type {
  AttachedDeclaration,
  MemberAttributeRole,
  MemberInfo,
  MemberKind,
  StoredPropertyInfo,
} from "@hitch/core";
import { declarationName, isStoredProperty, printNode } from "@hitch/core";
import type { ResolvedAttribute } from "./resolver.js";
import {
  isAttachedDeclaration,
  isNamespaceDeclaration,
  isTypeDeclaration,
  membersOf,
  syntaxKindName,
  withMembers,
} from "./syntax.js";

/** A member-attribute request a type keeps applying to its members */
export interface MemberAttributeBinding {
  readonly resolution: ResolvedAttribute;
  readonly role: MemberAttributeRole;
}

export interface ScopeEntry {
  /** Unique within the batch, e.g. "Store.items" or "Store.items#2" */
  readonly key: string;
  /** Dotted name path, e.g. "Store.items" */
  readonly path: string;
  readonly name: string | undefined;
  node: ts.Node;
  readonly parent: ScopeEntry | undefined;
  /** Member entries, for classes, namespaces and the batch root */
  readonly children: ScopeEntry[] | undefined;
  /** Produced by a macro rather than written in source */
  readonly introduced: boolean;
  removed: boolean;
  memberAttributes: MemberAttributeBinding[];
}

/** Hands out unique keys within one batch */
export class KeyAllocator {
  private readonly used = new Set<string>();

  claim(path: string): string {
    if (!this.used.has(path)) {
      this.used.add(path);
      return path;
    }
    for (let n = 2; ; n++) {
      const candidate = `${path}#${n}`;
      if (!this.used.has(candidate)) {
        this.used.add(candidate);
        return candidate;
      }
    }
  }
}

function childPath(parent: ScopeEntry | undefined, node: ts.Node, index: number): {
  path: string;
  name: string | undefined;
} {
  const name = declarationName(node);
  const segment = name ?? `<${syntaxKindName(node)}>@${index}`;
  const prefix = parent && parent.path !== "" ? `${parent.path}.` : "";
  return { path: prefix + segment, name };
}

/** Create an entry (and its member entries) for `node` */
export function createEntry(
  node: ts.Node,
  parent: ScopeEntry | undefined,
  index: number,
  keys: KeyAllocator,
  introduced: boolean
): ScopeEntry {
  const { path, name } = childPath(parent, node, index);
  const hasMembers = isTypeDeclaration(node);
  const entry: ScopeEntry = {
    key: keys.claim(path),
    path,
    name,
    node,
    parent,
    children: hasMembers ? [] : undefined,
    introduced,
    removed: false,
    memberAttributes: [],
  };
  if (hasMembers && entry.children) {
    membersOf(node).forEach((member, i) => {
      entry.children?.push(createEntry(member, entry, i, keys, introduced));
    });
  }
  return entry;
}

/** The container a batch's top-level statement and its peers live in */
export function createRoot(statement: ts.Statement, keys: KeyAllocator): ScopeEntry {
  const root: ScopeEntry = {
    key: "",
    path: "",
    name: undefined,
    node: statement,
    parent: undefined,
    children: [],
    introduced: false,
    removed: false,
    memberAttributes: [],
  };
  root.children?.push(createEntry(statement, root, 0, keys, false));
  return root;
}

export function liveChildren(entry: ScopeEntry): ScopeEntry[] {
  return (entry.children ?? []).filter((child) => !child.removed);
}

/** Rebuild the current node of an entry, members included */
export function materialize(entry: ScopeEntry): ts.Node {
  const node = entry.node;
  if (!entry.children || !isTypeDeclaration(node)) return node;
  return withMembers(node, liveChildren(entry).map(materialize));
}

/** Current declaration of an entry, or undefined for other statements and members */
export function materializeDeclaration(entry: ScopeEntry): AttachedDeclaration | undefined {
  const node = materialize(entry);
  return isAttachedDeclaration(node) ? node : undefined;
}

/** Parent entry when it is a class or namespace */
export function parentType(entry: ScopeEntry): ScopeEntry | undefined {
  const parent = entry.parent;
  return parent && parent.key !== "" && isTypeDeclaration(parent.node) ? parent : undefined;
}

/** The type whose members an expansion on `entry` reads: itself, or its parent */
export function owningType(entry: ScopeEntry): ScopeEntry | undefined {
  return entry.children && isTypeDeclaration(entry.node) ? entry : parentType(entry);
}

// =============================================================================
// Member reads
// =============================================================================

function memberKind(node: ts.Node): MemberKind {
  if (ts.isPropertyDeclaration(node) || ts.isVariableStatement(node)) return "property";
  if (ts.isMethodDeclaration(node)) return "method";
  if (ts.isGetAccessorDeclaration(node) || ts.isSetAccessorDeclaration(node)) return "accessor";
  if (ts.isConstructorDeclaration(node)) return "constructor";
  if (ts.isClassDeclaration(node)) return "class";
  if (isNamespaceDeclaration(node)) return "namespace";
  if (ts.isFunctionDeclaration(node)) return "function";
  return "other";
}

export function readMembers(type: ScopeEntry): MemberInfo[] {
  return liveChildren(type).map((child) => ({
    name: child.name,
    kind: memberKind(child.node),
    node: child.node,
  }));
}

export function readStoredProperties(
  type: ScopeEntry,
  sourceFile: ts.SourceFile
): StoredPropertyInfo[] {
  const out: StoredPropertyInfo[] = [];
  for (const child of liveChildren(type)) {
    const node = child.node;
    if (!isStoredProperty(node) || child.name === undefined) continue;
    out.push({
      name: child.name,
      type: node.type ? printNode(node.type, sourceFile) : undefined,
      optional: node.questionToken !== undefined,
      hasInitializer: node.initializer !== undefined,
      node,
    });
  }
  return out;
}
