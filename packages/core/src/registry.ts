/**
 * Role Registry - Stores attached macro definitions and validates their roles
 */

import type {
  DeclarationPosition,
  MacroDefinition,
  MacroRegistry,
  NamePattern,
  RoleKind,
  RoleSpec,
} from "./types.js";
import { MacroDefinitionError } from "./errors.js";

// ============================================================================
// Role Validation
// ============================================================================

/** Positions each role kind can occupy before `validTargets` narrows them */
export const ROLE_POSITIONS: Readonly<Record<RoleKind, readonly DeclarationPosition[]>> = {
  peer: [
    "class",
    "namespace",
    "function",
    "async-function",
    "method",
    "async-method",
    "stored-property",
    "computed-property",
  ],
  member: ["class", "namespace"],
  memberAttribute: ["class", "namespace"],
  accessor: ["stored-property"],
};

/** Positions a role applies to, after `validTargets` */
export function rolePositions(role: RoleSpec): readonly DeclarationPosition[] {
  const intrinsic = ROLE_POSITIONS[role.kind];
  const narrowed = role.validTargets;
  if (!narrowed) return intrinsic;
  return intrinsic.filter((position) => narrowed.includes(position));
}

function describePattern(pattern: NamePattern): string {
  switch (pattern.kind) {
    case "overloaded":
    case "arbitrary":
      return pattern.kind;
    case "prefixed":
      return `prefixed(${pattern.prefix})`;
    case "suffixed":
      return `suffixed(${pattern.suffix})`;
    case "named":
      return `named(${pattern.name})`;
  }
}

/**
 * Check a definition's role set. Returns one message per problem; an empty
 * list means the definition can be registered.
 */
export function validateRoles(definition: MacroDefinition): string[] {
  const problems: string[] = [];
  const { roles } = definition;

  if (roles.length === 0) {
    problems.push("declares no roles");
  }

  const seen = new Set<RoleKind>();
  for (const role of roles) {
    if (seen.has(role.kind)) {
      problems.push(`declares the ${role.kind} role more than once`);
    }
    seen.add(role.kind);

    if (role.validTargets && rolePositions(role).length === 0) {
      problems.push(
        `${role.kind} role's valid targets (${role.validTargets.join(", ")}) ` +
          `exclude every position the ${role.kind} role can occupy`
      );
    }

    for (const pattern of role.names ?? []) {
      const text =
        pattern.kind === "prefixed"
          ? pattern.prefix
          : pattern.kind === "suffixed"
            ? pattern.suffix
            : pattern.kind === "named"
              ? pattern.name
              : undefined;
      if (text !== undefined && text.length === 0) {
        problems.push(`${role.kind} role declares an empty ${describePattern(pattern)} pattern`);
      }
    }
  }

  const accessor = roles.some((role) => role.kind === "accessor");
  const storedMember = roles.some((role) => role.kind === "member" && !role.defaultWitness);
  if (accessor && storedMember) {
    problems.push(
      "combines the accessor role with a member role; both rewrite the storage " +
        "of the same type's properties"
    );
  }

  const generics = definition.genericParameters ?? [];
  const duplicates = generics.filter((name, index) => generics.indexOf(name) !== index);
  if (duplicates.length > 0) {
    problems.push(`repeats generic parameter(s) ${[...new Set(duplicates)].join(", ")}`);
  }

  return problems;
}

// ============================================================================
// Macro Registry Implementation
// ============================================================================

/**
 * Key for module-scoped lookup: "module::name"
 */
function definitionKey(name: string, mod: string | undefined): string {
  return `${mod ?? ""}::${name}`;
}

class MacroRegistryImpl implements MacroRegistry {
  private readonly definitions = new Map<string, MacroDefinition>();

  /** Secondary index: name -> every definition using it, across modules */
  private readonly byName = new Map<string, MacroDefinition[]>();

  register(definition: MacroDefinition): void {
    const key = definitionKey(definition.name, definition.module);
    if (this.definitions.get(key) === definition) return;

    const problems = validateRoles(definition);
    if (problems.length > 0) {
      throw new MacroDefinitionError(definition.name, problems);
    }

    if (this.definitions.has(key)) {
      throw new Error(
        `Attached macro '${definition.name}'` +
          (definition.module ? ` from '${definition.module}'` : "") +
          " is already registered"
      );
    }
    const frozen = freezeDefinition(definition);
    this.definitions.set(key, frozen);

    const list = this.byName.get(definition.name) ?? [];
    list.push(frozen);
    this.byName.set(definition.name, list);
  }

  lookup(name: string): readonly MacroDefinition[] {
    return this.byName.get(name) ?? [];
  }

  lookupRoles(name: string, module?: string): ReadonlySet<RoleSpec> | undefined {
    const definition = this.definitions.get(definitionKey(name, module));
    return definition ? new Set(definition.roles) : undefined;
  }

  getAll(): readonly MacroDefinition[] {
    return [...this.definitions.values()];
  }

  /** Clear all registered macros (useful for testing) */
  clear(): void {
    this.definitions.clear();
    this.byName.clear();
  }
}

/** Roles are fixed from registration on */
function freezeDefinition(definition: MacroDefinition): MacroDefinition {
  for (const role of definition.roles) {
    Object.freeze(role);
  }
  Object.freeze(definition.roles);
  if (definition.genericParameters) Object.freeze(definition.genericParameters);
  return Object.freeze(definition);
}

/** Global macro registry singleton */
export const globalRegistry: MacroRegistry = new MacroRegistryImpl();

/** Create a new isolated registry (for testing or scoped usage) */
export function createRegistry(): MacroRegistry {
  return new MacroRegistryImpl();
}

// ============================================================================
// Macro Definition Helpers
// ============================================================================

/**
 * Define an attached macro with type inference
 */
export function defineAttachedMacro(definition: MacroDefinition): MacroDefinition {
  return definition;
}

/**
 * Register multiple macros at once
 */
export function registerMacros(registry: MacroRegistry, ...macros: MacroDefinition[]): void {
  for (const macro of macros) {
    registry.register(macro);
  }
}
