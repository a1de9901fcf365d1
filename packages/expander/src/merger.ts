/**
 * Result Merger - places accepted fragments into a batch's scope tree
 *
 * - peer: new siblings right after the target, after its earlier peers
 * - member: appended to the type's members
 * - accessor: get/set fragments replace the stored property
 * - memberAttribute: attributes unioned into the member's attribute list
 */

import * as ts from "typescript";
import type { Fragment, RichDiagnostic } from "@hitch/core";
import { DiagnosticBuilder, HM2003, printNode } from "@hitch/core";
import type { KeyAllocator, ScopeEntry } from "./scope-tree.js";
import { createEntry } from "./scope-tree.js";
import {
  attributesOf,
  isAttachedDeclaration,
  isStatementNode,
  syntaxKindName,
  withAttributes,
} from "./syntax.js";

export interface MergeOrigin {
  /** Attribute that produced the fragments */
  readonly attribute: ts.Decorator;
  readonly macroName: string;
  readonly declarationPath: string;
  /** Nodes to locate diagnostics at when the attribute has no position */
  readonly fallbacks: readonly ts.Node[];
}

export interface MergerOptions {
  sourceFile: ts.SourceFile;
  keys: KeyAllocator;
  emit: (diagnostic: RichDiagnostic) => void;
}

type Container = "root" | "class" | "namespace";

function containerOf(entry: ScopeEntry): Container {
  if (entry.key === "") return "root";
  return ts.isClassDeclaration(entry.node) ? "class" : "namespace";
}

const PLACEMENT: Record<Container, string> = {
  root: "at the top level",
  class: "inside a class",
  namespace: "inside a namespace",
};

function fits(container: Container, node: ts.Node): boolean {
  return container === "class" ? ts.isClassElement(node) : isStatementNode(node);
}

function describeFragment(node: ts.Node): string {
  return `a ${syntaxKindName(node)}`;
}

export class ResultMerger {
  /** Last peer inserted for each target, so later peers follow it */
  private readonly lastPeer = new Map<ScopeEntry, ScopeEntry>();

  constructor(private readonly options: MergerOptions) {}

  private reject(origin: MergeOrigin, fragment: Fragment, placement: string): void {
    new DiagnosticBuilder(HM2003, this.options.sourceFile, this.options.emit)
      .at(origin.attribute, ...origin.fallbacks)
      .in(origin.declarationPath, origin.macroName)
      .withArgs({
        macro: origin.macroName,
        fragment: describeFragment(fragment.node),
        placement,
      })
      .emit();
  }

  /** Insert peer fragments after `target` in its container */
  insertPeers(target: ScopeEntry, fragments: readonly Fragment[], origin: MergeOrigin): ScopeEntry[] {
    const container = target.parent;
    const siblings = container?.children;
    if (!container || !siblings) return [];

    const kind = containerOf(container);
    const placed: ScopeEntry[] = [];
    for (const fragment of fragments) {
      if (!fits(kind, fragment.node)) {
        this.reject(origin, fragment, PLACEMENT[kind]);
        continue;
      }
      const anchor = this.lastPeer.get(target) ?? target;
      const index = siblings.indexOf(anchor) + 1;
      const entry = createEntry(fragment.node, container, index, this.options.keys, true);
      siblings.splice(index, 0, entry);
      this.lastPeer.set(target, entry);
      placed.push(entry);
    }
    return placed;
  }

  /** Append member fragments to a type */
  appendMembers(type: ScopeEntry, fragments: readonly Fragment[], origin: MergeOrigin): ScopeEntry[] {
    const members = type.children;
    if (!members) return [];

    const kind = containerOf(type);
    const placed: ScopeEntry[] = [];
    for (const fragment of fragments) {
      if (!fits(kind, fragment.node)) {
        this.reject(origin, fragment, PLACEMENT[kind]);
        continue;
      }
      const entry = createEntry(fragment.node, type, members.length, this.options.keys, true);
      members.push(entry);
      placed.push(entry);
    }
    return placed;
  }

  /**
   * Replace a stored property with accessor fragments. With no valid
   * fragments the property stays stored.
   */
  replaceWithAccessors(
    property: ScopeEntry,
    fragments: readonly { readonly fragment: Fragment; readonly origin: MergeOrigin }[]
  ): ScopeEntry[] {
    const container = property.parent;
    const siblings = container?.children;
    if (!container || !siblings) return [];

    const accepted: Fragment[] = [];
    for (const { fragment, origin } of fragments) {
      const node = fragment.node;
      const accessor = ts.isGetAccessorDeclaration(node) || ts.isSetAccessorDeclaration(node);
      if (
        !accessor ||
        !ts.isClassDeclaration(container.node) ||
        !ts.isIdentifier(node.name) ||
        node.name.text !== property.name
      ) {
        this.reject(origin, fragment, `as an accessor of \`${property.name ?? "<unnamed>"}\``);
        continue;
      }
      accepted.push(fragment);
    }
    if (accepted.length === 0) return [];

    const index = siblings.indexOf(property);
    property.removed = true;
    const placed = accepted.map((fragment, i) =>
      createEntry(fragment.node, container, index + 1 + i, this.options.keys, true)
    );
    siblings.splice(index + 1, 0, ...placed);
    return placed;
  }

  /**
   * Union attributes into a member by printed text. Returns the attributes
   * that were not there yet.
   */
  unionAttributes(member: ScopeEntry, attributes: readonly ts.Decorator[]): ts.Decorator[] {
    const node = member.node;
    if (!isAttachedDeclaration(node)) return [];

    const current = attributesOf(node);
    const seen = new Set(current.map((a) => printNode(a, this.options.sourceFile)));
    const added: ts.Decorator[] = [];
    for (const attribute of attributes) {
      const text = printNode(attribute, this.options.sourceFile);
      if (seen.has(text)) continue;
      seen.add(text);
      added.push(attribute);
    }
    if (added.length === 0) return added;

    member.node = withAttributes(node, [...current, ...added]);
    return added;
  }
}
