/**
 * Expansion Scheduler - expands one batch to completion
 *
 * A batch is one top-level statement, its whole scope subtree, and every
 * declaration macros introduce while expanding it. Declarations are visited
 * depth-first in pre-order from an explicit worklist: a declaration's own
 * expansions run first, then its members, then the peers it produced.
 *
 * On one declaration, roles run in the order
 * memberAttribute -> member -> peer -> accessor, each in source order.
 * Default-witness member requests wait until the worklist is empty.
 *
 * An attribute occurrence's output is all or nothing: when one of its roles
 * throws, whatever its other roles already merged is taken back out.
 *
 * Everything happens on a staging mirror (see scope-tree.ts). Dependency
 * cycles and nontermination abort the batch; the unit then keeps the
 * batch's original statement.
 */

import * as ts from "typescript";
import type {
  AttachedDeclaration,
  DeclarationLookup,
  DiagnosticSink,
  Fragment,
  MemberInfo,
  MemberRole,
  RichDiagnostic,
  RoleKind,
  RoleSpec,
  StoredPropertyInfo,
  UniqueNameAllocator,
} from "@hitch/core";
import {
  DiagnosticBuilder,
  HM2001,
  HM2002,
  HM3001,
  HM3002,
  HM9999,
  ROLE_EXECUTION_ORDER,
  printNode,
  validateFragments,
} from "@hitch/core";
import { DependencyGraph } from "./dependency-graph.js";
import type { MacroInvoker } from "./invoker.js";
import type { MergeOrigin } from "./merger.js";
import { ResultMerger } from "./merger.js";
import type { AttributeResolution, AttributeResolver, ResolvedAttribute } from "./resolver.js";
import type { MemberAttributeBinding, ScopeEntry } from "./scope-tree.js";
import {
  KeyAllocator,
  createRoot,
  liveChildren,
  materialize,
  materializeDeclaration,
  owningType,
  parentType,
  readMembers,
  readStoredProperties,
} from "./scope-tree.js";
import { attributesOf, isAttachedDeclaration, isStatementNode, withAttributes } from "./syntax.js";

// =============================================================================
// Logs
// =============================================================================

/** One invocation, recorded when it runs */
export interface RequestRecord {
  readonly key: string;
  /** Key of the type the target is a member of */
  readonly parentKey: string | undefined;
  readonly role: RoleKind;
  readonly witness: boolean;
  readonly macro: string;
}

/** One call to a dependency-recording read */
export interface ReadRecord {
  /** Declaration whose attribute's expansion made the read */
  readonly consumerKey: string;
  readonly typeKey: string;
  readonly kind: "storedProperties" | "members";
}

export interface BatchStats {
  requests: number;
  fragments: number;
}

export interface BatchOptions {
  sourceFile: ts.SourceFile;
  resolver: AttributeResolver;
  invoker: MacroInvoker;
  allocator: UniqueNameAllocator;
  sink: DiagnosticSink;
  feedbackLimit: number;
  verbose: boolean;
}

export interface BatchOutcome {
  readonly statements: readonly ts.Statement[];
  /** The batch merged at least one change */
  readonly changed: boolean;
  readonly aborted: boolean;
  readonly stats: BatchStats;
}

/** Builders for batch-fatal diagnostics emit nowhere; the batch emits them after truncating */
const detached = (): void => undefined;

/** Thrown inside a batch to abandon it; carries the batch-fatal diagnostic */
class BatchAbort extends Error {
  constructor(readonly diagnostic: RichDiagnostic) {
    super(diagnostic.message);
    this.name = "BatchAbort";
  }
}

/** What one attribute occurrence has merged so far */
interface OccurrenceOutput {
  readonly entries: ScopeEntry[];
  readonly attributes: { readonly member: ScopeEntry; readonly added: readonly ts.Decorator[] }[];
}

interface DeferredWitness {
  readonly entry: ScopeEntry;
  readonly resolution: ResolvedAttribute;
  readonly role: MemberRole;
}

function isResolved(resolution: AttributeResolution): resolution is ResolvedAttribute {
  return resolution.status === "resolved";
}

function isWitness(role: RoleSpec): role is MemberRole {
  return role.kind === "member" && role.defaultWitness === true;
}

/** Derive dependency edges from what a batch requested and read */
export function deriveEdges(
  requests: readonly RequestRecord[],
  reads: readonly ReadRecord[]
): DependencyGraph {
  const graph = new DependencyGraph();

  for (const read of reads) {
    const producers = requests.filter((request) => {
      if (read.kind === "storedProperties") {
        return (
          (request.role === "member" && !request.witness && request.key === read.typeKey) ||
          ((request.role === "peer" || request.role === "accessor") &&
            request.parentKey === read.typeKey)
        );
      }
      return (
        (request.role === "member" && request.key === read.typeKey) ||
        (request.role === "peer" && request.parentKey === read.typeKey)
      );
    });

    const what = read.kind === "storedProperties" ? "stored properties" : "members";
    for (const producer of producers) {
      if (producer.key === read.consumerKey) continue;
      graph.addEdge(
        producer.key,
        read.consumerKey,
        `\`@${producer.macro}\` on ${producer.key} changes the ${what} of ${read.typeKey}, which ${read.consumerKey} reads`
      );
    }
  }

  return graph;
}

export class Batch {
  private readonly keys = new KeyAllocator();
  private readonly root: ScopeEntry;
  private readonly merger: ResultMerger;

  private readonly worklist: ScopeEntry[] = [];
  private readonly deferred: DeferredWitness[] = [];
  private readonly requests: RequestRecord[] = [];
  private readonly reads: ReadRecord[] = [];
  private readonly fingerprints = new Set<string>();
  private readonly outputs = new Map<ts.Decorator, OccurrenceOutput>();
  /** Attributes of occurrences whose implementation threw */
  private readonly failed = new Set<ts.Decorator>();
  private feedback = 0;
  private changed = false;
  private readonly stats: BatchStats = { requests: 0, fragments: 0 };

  constructor(
    private readonly statement: ts.Statement,
    private readonly options: BatchOptions
  ) {
    this.root = createRoot(statement, this.keys);
    this.merger = new ResultMerger({
      sourceFile: options.sourceFile,
      keys: this.keys,
      emit: options.sink.emitter,
    });
  }

  run(): BatchOutcome {
    const { sink } = this.options;
    const mark = sink.size;

    try {
      this.pushAll(liveChildren(this.root));
      this.drain();
      this.checkCycles();
      return {
        statements: this.changed ? this.commit() : [this.statement],
        changed: this.changed,
        aborted: false,
        stats: this.stats,
      };
    } catch (error) {
      if (!(error instanceof BatchAbort)) throw error;
      sink.truncate(mark);
      sink.emitter(error.diagnostic);
      return { statements: [this.statement], changed: false, aborted: true, stats: this.stats };
    }
  }

  // ---------------------------------------------------------------------------
  // Worklist
  // ---------------------------------------------------------------------------

  /** Push entries so that the first one is visited next */
  private pushAll(entries: readonly ScopeEntry[]): void {
    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      if (entry) this.worklist.push(entry);
    }
  }

  private drain(): void {
    for (;;) {
      let entry = this.worklist.pop();
      while (entry) {
        this.visit(entry);
        entry = this.worklist.pop();
      }
      if (this.deferred.length === 0) return;
      for (const witness of this.deferred.splice(0)) {
        this.runWitness(witness);
      }
    }
  }

  private visit(entry: ScopeEntry): void {
    if (entry.removed) return;

    const declaration = materializeDeclaration(entry);
    if (!declaration) {
      this.pushAll(liveChildren(entry));
      return;
    }

    const attributes = attributesOf(declaration);
    if (attributes.length > 0) {
      if (entry.introduced) this.charge(entry);
      this.recordState(entry, declaration);
    }

    const resolved = this.options.resolver
      .resolve(declaration, entry.path, this.statement)
      .filter(isResolved);

    const produced: ScopeEntry[] = [];
    const accessors: { fragment: Fragment; origin: MergeOrigin }[] = [];

    for (const kind of ROLE_EXECUTION_ORDER) {
      for (const resolution of resolved) {
        for (const role of resolution.roles) {
          if (role.kind !== kind || this.hasFailed(resolution)) continue;
          switch (role.kind) {
            case "memberAttribute":
              entry.memberAttributes.push({ resolution, role });
              break;
            case "member":
              if (isWitness(role)) {
                this.deferred.push({ entry, resolution, role });
              } else {
                this.runMember(entry, resolution, role);
              }
              break;
            case "peer":
              produced.push(...this.runPeer(entry, resolution, role));
              break;
            case "accessor":
              accessors.push(...this.runAccessor(entry, resolution, role));
              break;
          }
        }
      }

      if (kind === "memberAttribute" && entry.memberAttributes.length > 0) {
        this.offerMembers(entry, liveChildren(entry), entry.memberAttributes);
      }
    }

    const replacing = accessors.filter(({ origin }) => !this.failed.has(origin.attribute));
    if (replacing.length > 0) {
      produced.unshift(...this.placed(this.merger.replaceWithAccessors(entry, replacing)));
    }

    // Consumed attributes leave the declaration; the rest stay
    const consumed = new Set(resolved.map((r) => r.occurrence.attribute));
    const current = entry.node;
    if (consumed.size > 0 && !entry.removed && isAttachedDeclaration(current)) {
      entry.node = withAttributes(current, attributesOf(current).filter((a) => !consumed.has(a)));
      this.changed = true;
    }

    this.pushAll(produced.filter((p) => !p.removed));
    this.pushAll(entry.removed ? [] : liveChildren(entry));
  }

  // ---------------------------------------------------------------------------
  // Feedback
  // ---------------------------------------------------------------------------

  private charge(entry: ScopeEntry): void {
    this.feedback++;
    if (this.feedback > this.options.feedbackLimit) {
      this.abortNonterminating(
        entry,
        `feedback limit of ${this.options.feedbackLimit} rounds exceeded`
      );
    }
  }

  /** Remember a declaration's state; seeing it again means expansion loops */
  private recordState(entry: ScopeEntry, declaration: AttachedDeclaration): void {
    const { sourceFile } = this.options;
    const attributes = attributesOf(declaration)
      .map((a) => printNode(a, sourceFile))
      .sort();
    const text = printNode(withAttributes(declaration, []), sourceFile);
    const fingerprint = `${entry.path}\n${attributes.join("\n")}\n${text}`;

    if (this.fingerprints.has(fingerprint)) {
      this.abortNonterminating(entry, `\`${entry.path}\` returned to a state it was already in`);
    }
    this.fingerprints.add(fingerprint);
  }

  private abortNonterminating(entry: ScopeEntry, reason: string): never {
    const diagnostic = new DiagnosticBuilder(HM3002, this.options.sourceFile, detached)
      .at(this.statement)
      .in(entry.path)
      .withArgs({ declaration: entry.path, reason })
      .emit();
    throw new BatchAbort(diagnostic);
  }

  // ---------------------------------------------------------------------------
  // Invocation
  // ---------------------------------------------------------------------------

  private lookupFor(entry: ScopeEntry): DeclarationLookup {
    const type = owningType(entry);
    const { sourceFile } = this.options;
    const record = (kind: ReadRecord["kind"]): void => {
      if (type) this.reads.push({ consumerKey: entry.key, typeKey: type.key, kind });
    };
    return {
      storedProperties: (): readonly StoredPropertyInfo[] => {
        record("storedProperties");
        return type ? readStoredProperties(type, sourceFile) : [];
      },
      members: (): readonly MemberInfo[] => {
        record("members");
        return type ? readMembers(type) : [];
      },
    };
  }

  /**
   * Run one request and validate its names. Returns the accepted fragments,
   * or undefined when the invocation failed.
   */
  private invoke(
    entry: ScopeEntry,
    resolution: ResolvedAttribute,
    role: RoleSpec,
    member?: ScopeEntry
  ): readonly Fragment[] | undefined {
    const { invoker, sourceFile, allocator, sink, verbose } = this.options;
    const declaration = materializeDeclaration(entry);
    const memberDeclaration = member ? materializeDeclaration(member) : undefined;
    if (!declaration || (member && !memberDeclaration)) {
      new DiagnosticBuilder(HM9999, sourceFile, sink.emitter)
        .at(resolution.occurrence.attribute, this.statement)
        .in(entry.path, resolution.definition.name)
        .withArgs({ message: `\`${entry.path}\` is not a declaration` })
        .emit();
      return undefined;
    }

    this.requests.push({
      key: entry.key,
      parentKey: parentType(entry)?.key,
      role: role.kind,
      witness: isWitness(role),
      macro: resolution.definition.name,
    });
    this.stats.requests++;

    const outcome = invoker.invoke(
      { occurrence: resolution.occurrence, definition: resolution.definition, role },
      {
        declaration,
        member: memberDeclaration,
        declarationPath: entry.path,
        lookup: this.lookupFor(entry),
        anchor: this.statement,
      }
    );
    if (!outcome.success) {
      if (outcome.diagnostic.kind === "MacroImplementationError") this.discard(entry, resolution);
      return undefined;
    }

    const { accepted, violations } = validateFragments(
      role,
      entry.name,
      outcome.result.fragments,
      allocator
    );
    for (const violation of violations) {
      const descriptor = violation.kind === "WitnessStoredProperty" ? HM2002 : HM2001;
      new DiagnosticBuilder(descriptor, sourceFile, sink.emitter)
        .at(resolution.occurrence.attribute, declaration, this.statement)
        .in(entry.path, resolution.definition.name)
        .withArgs({ macro: resolution.definition.name, introduced: violation.name, role: role.kind })
        .emit();
    }

    if (verbose) {
      console.log(
        `[hitch:expand] ${entry.key}: @${resolution.definition.name} (${role.kind}) → ${accepted.length} fragment(s)`
      );
    }
    return accepted;
  }

  private originOf(entry: ScopeEntry, resolution: ResolvedAttribute): MergeOrigin {
    return {
      attribute: resolution.occurrence.attribute,
      macroName: resolution.definition.name,
      declarationPath: entry.path,
      fallbacks: [entry.node, this.statement],
    };
  }

  /** Count merged entries; with a resolution, remember them as its output */
  private placed(entries: readonly ScopeEntry[], resolution?: ResolvedAttribute): readonly ScopeEntry[] {
    if (entries.length > 0) this.changed = true;
    this.stats.fragments += entries.length;
    if (resolution) this.outputOf(resolution).entries.push(...entries);
    return entries;
  }

  private outputOf(resolution: ResolvedAttribute): OccurrenceOutput {
    const attribute = resolution.occurrence.attribute;
    let output = this.outputs.get(attribute);
    if (!output) {
      output = { entries: [], attributes: [] };
      this.outputs.set(attribute, output);
    }
    return output;
  }

  private hasFailed(resolution: ResolvedAttribute): boolean {
    return this.failed.has(resolution.occurrence.attribute);
  }

  /**
   * Take back everything an occurrence merged and stop running its roles.
   * Reads other expansions already made of that output are not replayed.
   */
  private discard(entry: ScopeEntry, resolution: ResolvedAttribute): void {
    const attribute = resolution.occurrence.attribute;
    if (this.failed.has(attribute)) return;
    this.failed.add(attribute);
    entry.memberAttributes = entry.memberAttributes.filter(
      (binding) => binding.resolution.occurrence.attribute !== attribute
    );

    const output = this.outputs.get(attribute);
    if (!output) return;
    this.outputs.delete(attribute);

    for (const produced of output.entries) {
      if (produced.removed) continue;
      produced.removed = true;
      this.stats.fragments--;
    }
    for (const { member, added } of output.attributes) {
      const node = member.node;
      if (!isAttachedDeclaration(node)) continue;
      member.node = withAttributes(node, attributesOf(node).filter((a) => !added.includes(a)));
    }
  }

  private runMember(entry: ScopeEntry, resolution: ResolvedAttribute, role: MemberRole): void {
    const fragments = this.invoke(entry, resolution, role);
    if (!fragments) return;
    const added = this.placed(
      this.merger.appendMembers(entry, fragments, this.originOf(entry, resolution)),
      resolution
    );
    this.offerMembers(entry, added, entry.memberAttributes);
  }

  private runPeer(entry: ScopeEntry, resolution: ResolvedAttribute, role: RoleSpec): readonly ScopeEntry[] {
    const fragments = this.invoke(entry, resolution, role);
    if (!fragments) return [];
    return this.placed(
      this.merger.insertPeers(entry, fragments, this.originOf(entry, resolution)),
      resolution
    );
  }

  private runAccessor(
    entry: ScopeEntry,
    resolution: ResolvedAttribute,
    role: RoleSpec
  ): { fragment: Fragment; origin: MergeOrigin }[] {
    const fragments = this.invoke(entry, resolution, role) ?? [];
    const origin = this.originOf(entry, resolution);
    return fragments.map((fragment) => ({ fragment, origin }));
  }

  private runWitness({ entry, resolution, role }: DeferredWitness): void {
    if (entry.removed || this.hasFailed(resolution)) return;
    const fragments = this.invoke(entry, resolution, role);
    if (!fragments) return;

    // A witness is only a default: members that already exist win
    const existing = new Set(liveChildren(entry).flatMap((child) => (child.name ? [child.name] : [])));
    const fresh = fragments.filter((fragment) => !fragment.names.some((name) => existing.has(name)));

    const added = this.placed(
      this.merger.appendMembers(entry, fresh, this.originOf(entry, resolution)),
      resolution
    );
    this.offerMembers(entry, added, entry.memberAttributes);
    this.pushAll(added);
  }

  // ---------------------------------------------------------------------------
  // Member attributes
  // ---------------------------------------------------------------------------

  /**
   * Offer members to a type's member-attribute macros until no attribute
   * list changes. Every round after the first counts against the feedback
   * budget. A binding that hands a member a member-attribute macro it
   * already carries would re-apply that macro forever.
   */
  private offerMembers(
    type: ScopeEntry,
    members: readonly ScopeEntry[],
    bindings: readonly MemberAttributeBinding[]
  ): void {
    if (bindings.length === 0) return;
    const { resolver, sourceFile } = this.options;

    let pending = members.filter((member) => !member.removed && materializeDeclaration(member));
    let round = 0;
    while (pending.length > 0) {
      if (round > 0) this.charge(type);
      const changed = new Set<ScopeEntry>();

      for (const { resolution, role } of bindings) {
        for (const member of pending) {
          if (this.hasFailed(resolution)) break;
          const carried = new Set(this.attributeTexts(member));
          const fragments = this.invoke(type, resolution, role, member);
          if (!fragments) continue;

          const attributes = fragments.map((f) => f.node).filter(ts.isDecorator);
          const repeated = attributes.find(
            (a) => carried.has(printNode(a, sourceFile)) && resolver.namesMemberAttributeMacro(a)
          );
          if (repeated) {
            this.abortNonterminating(type, `\`${member.path}\` returned to a state it was already in`);
          }

          const added = this.merger.unionAttributes(member, attributes);
          if (added.length > 0) {
            this.outputOf(resolution).attributes.push({ member, added });
            this.changed = true;
            changed.add(member);
          }
        }
      }

      pending = [...changed].filter((member) => !member.removed);
      round++;
    }
  }

  private attributeTexts(member: ScopeEntry): string[] {
    const node = member.node;
    if (!isAttachedDeclaration(node)) return [];
    return attributesOf(node).map((a) => printNode(a, this.options.sourceFile));
  }

  // ---------------------------------------------------------------------------
  // Commit
  // ---------------------------------------------------------------------------

  private checkCycles(): void {
    const cycle = deriveEdges(this.requests, this.reads).findCycle();
    if (!cycle) return;

    const builder = new DiagnosticBuilder(HM3001, this.options.sourceFile, detached)
      .at(this.statement)
      .in(cycle.path[0] ?? "")
      .withArgs({ path: cycle.path.join(" -> ") });
    for (const edge of cycle.edges) builder.note(edge.reason);
    throw new BatchAbort(builder.emit());
  }

  private commit(): ts.Statement[] {
    const statements: ts.Statement[] = [];
    for (const child of liveChildren(this.root)) {
      const node = materialize(child);
      if (isStatementNode(node)) statements.push(node);
    }
    return statements;
  }
}
