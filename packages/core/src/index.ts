/**
 * Core module exports for @hitch/core
 *
 * This package provides:
 * - Attached-macro types and the role registry
 * - The expansion context handed to macro implementations
 * - Name hygiene (unique names, name-pattern validation)
 * - Diagnostics and configuration
 */

export * from "./types.js";
export * from "./registry.js";
export * from "./context.js";
export * from "./errors.js";

// Configuration System
export {
  config,
  defineConfig,
  DEFAULT_FEEDBACK_LIMIT,
  type HitchConfig,
  type ExpansionConfig,
  type ResolvedConfig,
  type ConfigValues,
  type ConfigLoadOptions,
  type UnknownAttributePolicy,
} from "./config.js";

// Diagnostics System
export * from "./diagnostics.js";

// Hygiene System
export {
  UniqueNameAllocator,
  matchesPattern,
  isPermittedName,
  validateFragments,
  toFragments,
  type NameViolation,
  type FragmentValidation,
} from "./hygiene.js";

// AST Utilities
export {
  stripPositions,
  parseStatements,
  parseMembers,
  parseAttribute,
  getPrinter,
  printNode,
  decoratorsOf,
  getAttributes,
  declarationName,
  introducedNames,
  isStoredProperty,
  introducesStorage,
} from "./ast-utils.js";
