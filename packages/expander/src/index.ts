/**
 * @hitch/expander - schedules, runs and merges attached-macro expansions
 */

export {
  AttachedMacroExpander,
  expandSourceFile,
  expandSource,
  printSourceFile,
  type ExpanderOptions,
  type ExpansionStats,
  type UnitExpansion,
} from "./engine.js";

export { Batch, deriveEdges, type BatchOptions, type BatchOutcome, type ReadRecord, type RequestRecord } from "./scheduler.js";
export { DependencyGraph, type DependencyCycle } from "./dependency-graph.js";
export { ResultMerger, type MergeOrigin, type MergerOptions } from "./merger.js";
export { MacroInvoker, type InvocationOutcome, type InvocationTarget, type InvokerOptions } from "./invoker.js";
export {
  AttributeResolver,
  scanImports,
  type AttributeResolution,
  type FailedAttribute,
  type IgnoredAttribute,
  type ImportScope,
  type ResolvedAttribute,
  type ResolverOptions,
} from "./resolver.js";
export {
  KeyAllocator,
  createEntry,
  createRoot,
  liveChildren,
  materialize,
  materializeDeclaration,
  owningType,
  parentType,
  readMembers,
  readStoredProperties,
  type MemberAttributeBinding,
  type ScopeEntry,
} from "./scope-tree.js";
export {
  isTypeDeclaration,
  isNamespaceDeclaration,
  isAttachedDeclaration,
  isStatementNode,
  positionOf,
  describePosition,
  syntaxKindName,
  parseDecorator,
  withAttributes,
  withMembers,
  membersOf,
  attributesOf,
  type ParsedAttribute,
} from "./syntax.js";
