/**
 * Name Hygiene
 *
 * Two halves:
 * - `UniqueNameAllocator` hands out identifiers that cannot collide with user
 *   code or with each other for the lifetime of a compilation run.
 * - The validator checks every name a fragment introduces against the
 *   producing role's declared name patterns.
 *
 * @example
 * ```typescript
 * const allocator = new UniqueNameAllocator();
 * allocator.allocate("temp");   // "__hitch_temp_0__"
 * allocator.allocate("temp");   // "__hitch_temp_1__"
 *
 * isPermittedName([names.prefixed("$")], "value", "$value", allocator); // true
 * ```
 */

import * as ts from "typescript";
import type { Fragment, NamePattern, RoleSpec } from "./types.js";
import { introducedNames, introducesStorage } from "./ast-utils.js";

// =============================================================================
// UniqueNameAllocator
// =============================================================================

/**
 * Per-run allocator. The counter only ever increases, so a name is never
 * issued twice, even across batches and files.
 */
export class UniqueNameAllocator {
  private counter = 0;
  private readonly issued = new Set<string>();

  allocate(base: string): string {
    const sanitized = sanitizeBase(base);
    const name = `__hitch_${sanitized}_${this.counter++}__`;
    this.issued.add(name);
    return name;
  }

  createIdentifier(base: string, factory: ts.NodeFactory = ts.factory): ts.Identifier {
    return factory.createIdentifier(this.allocate(base));
  }

  isIssued(name: string): boolean {
    return this.issued.has(name);
  }

  get issuedCount(): number {
    return this.issued.size;
  }

  /**
   * Reset the allocator (for testing).
   */
  reset(): void {
    this.counter = 0;
    this.issued.clear();
  }
}

/** Keep only identifier characters; never empty */
function sanitizeBase(base: string): string {
  const cleaned = base.replace(/[^A-Za-z0-9_$]/g, "_");
  return cleaned.length > 0 ? cleaned : "tmp";
}

// =============================================================================
// Name Policies
// =============================================================================

export function matchesPattern(
  pattern: NamePattern,
  targetName: string | undefined,
  candidate: string
): boolean {
  switch (pattern.kind) {
    case "arbitrary":
      return true;
    case "named":
      return candidate === pattern.name;
    case "overloaded":
      return targetName !== undefined && candidate === targetName;
    case "prefixed":
      return targetName !== undefined && candidate === pattern.prefix + targetName;
    case "suffixed":
      return targetName !== undefined && candidate === targetName + pattern.suffix;
  }
}

/**
 * Whether a role with `policy` may introduce `candidate` next to a target
 * named `targetName`. Allocator-issued names are always permitted.
 */
export function isPermittedName(
  policy: readonly NamePattern[] | undefined,
  targetName: string | undefined,
  candidate: string,
  allocator: UniqueNameAllocator
): boolean {
  if (allocator.isIssued(candidate)) return true;
  return (policy ?? []).some((pattern) => matchesPattern(pattern, targetName, candidate));
}

// =============================================================================
// Fragment Validation
// =============================================================================

export type NameViolation =
  | { readonly kind: "InvalidIntroducedName"; readonly fragment: Fragment; readonly name: string }
  | { readonly kind: "WitnessStoredProperty"; readonly fragment: Fragment; readonly name: string };

export interface FragmentValidation {
  readonly accepted: readonly Fragment[];
  readonly violations: readonly NameViolation[];
}

/** Tag raw nodes with the names they introduce */
export function toFragments(nodes: readonly ts.Node[]): Fragment[] {
  return nodes.map((node) => ({ node, names: introducedNames(node) }));
}

/**
 * Split fragments into accepted ones and violations. A fragment is rejected
 * as a whole when any of its names is not permitted; its siblings are kept.
 */
export function validateFragments(
  role: RoleSpec,
  targetName: string | undefined,
  fragments: readonly Fragment[],
  allocator: UniqueNameAllocator
): FragmentValidation {
  const accepted: Fragment[] = [];
  const violations: NameViolation[] = [];
  const witness = role.kind === "member" && role.defaultWitness === true;

  for (const fragment of fragments) {
    if (witness && introducesStorage(fragment.node)) {
      violations.push({
        kind: "WitnessStoredProperty",
        fragment,
        name: fragment.names[0] ?? "<unnamed>",
      });
      continue;
    }

    // Accessors reuse the property's own name; their shape is checked on merge
    if (role.kind === "accessor") {
      accepted.push(fragment);
      continue;
    }

    const bad = fragment.names.find(
      (name) => !isPermittedName(role.names, targetName, name, allocator)
    );
    if (bad !== undefined) {
      violations.push({ kind: "InvalidIntroducedName", fragment, name: bad });
      continue;
    }

    accepted.push(fragment);
  }

  return { accepted, violations };
}
