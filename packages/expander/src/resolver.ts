/**
 * Attribute Resolver - maps attributes to macro definitions and roles
 *
 * Visibility follows the unit's imports:
 * - a definition without a module is visible everywhere
 * - a module-scoped definition is visible when the unit imports from its module
 * - `@name` bound by a named import only resolves against that module
 * - `@ns.name` resolves against the module bound to `import * as ns`
 */

import * as ts from "typescript";
import type {
  AttachedDeclaration,
  AttributeOccurrence,
  DeclarationPosition,
  MacroDefinition,
  MacroRegistry,
  RichDiagnostic,
  RoleSpec,
  UnknownAttributePolicy,
} from "@hitch/core";
import { DiagnosticBuilder, HM1001, HM1002, HM1003, rolePositions } from "@hitch/core";
import { attributesOf, describePosition, parseDecorator, positionOf } from "./syntax.js";

// =============================================================================
// Import scope
// =============================================================================

export interface ImportScope {
  /** Every module the unit imports from */
  readonly modules: ReadonlySet<string>;
  /** Local name -> module and exported name, for `import { a as b }` */
  readonly named: ReadonlyMap<string, { readonly module: string; readonly imported: string }>;
  /** Namespace alias -> module, for `import * as ns` */
  readonly namespaces: ReadonlyMap<string, string>;
}

export function scanImports(sourceFile: ts.SourceFile): ImportScope {
  const modules = new Set<string>();
  const named = new Map<string, { module: string; imported: string }>();
  const namespaces = new Map<string, string>();

  for (const statement of sourceFile.statements) {
    if (!ts.isImportDeclaration(statement)) continue;
    const specifier = statement.moduleSpecifier;
    if (!ts.isStringLiteral(specifier)) continue;

    const moduleName = specifier.text;
    modules.add(moduleName);

    const bindings = statement.importClause?.namedBindings;
    if (!bindings) continue;

    if (ts.isNamespaceImport(bindings)) {
      namespaces.set(bindings.name.text, moduleName);
    } else {
      for (const element of bindings.elements) {
        const imported = (element.propertyName ?? element.name).text;
        named.set(element.name.text, { module: moduleName, imported });
      }
    }
  }

  return { modules, named, namespaces };
}

// =============================================================================
// Resolutions
// =============================================================================

export interface ResolvedAttribute {
  readonly status: "resolved";
  readonly occurrence: AttributeOccurrence;
  readonly definition: MacroDefinition;
  /** Roles legal at the declaration's position, in definition order */
  readonly roles: readonly RoleSpec[];
}

export interface FailedAttribute {
  readonly status: "failed";
  readonly attribute: ts.Decorator;
  readonly diagnostic: RichDiagnostic;
}

/** Not a macro attribute; left on the declaration untouched */
export interface IgnoredAttribute {
  readonly status: "ignored";
  readonly attribute: ts.Decorator;
}

export type AttributeResolution = ResolvedAttribute | FailedAttribute | IgnoredAttribute;

export interface ResolverOptions {
  registry: MacroRegistry;
  sourceFile: ts.SourceFile;
  imports: ImportScope;
  unknownAttributes: UnknownAttributePolicy;
  emit: (diagnostic: RichDiagnostic) => void;
}

function describeModule(module: string | undefined): string {
  return module === undefined ? "the global scope" : `'${module}'`;
}

export class AttributeResolver {
  constructor(private readonly options: ResolverOptions) {}

  /** Definitions visible under an attribute's spelling */
  visibleDefinitions(macroName: string, qualifier: string | undefined): MacroDefinition[] {
    const { registry, imports } = this.options;

    if (qualifier !== undefined) {
      const module = imports.namespaces.get(qualifier);
      if (module === undefined) return [];
      return registry.lookup(macroName).filter((d) => d.module === module);
    }

    const binding = imports.named.get(macroName);
    if (binding) {
      return registry
        .lookup(binding.imported)
        .filter((d) => d.module === binding.module);
    }

    return registry
      .lookup(macroName)
      .filter((d) => d.module === undefined || imports.modules.has(d.module));
  }

  /**
   * Whether an attribute names exactly one visible macro that has a
   * member-attribute role. Reports nothing.
   */
  namesMemberAttributeMacro(attribute: ts.Decorator): boolean {
    const parsed = parseDecorator(attribute);
    if (!parsed) return false;
    const [definition, ...others] = this.visibleDefinitions(parsed.macroName, parsed.qualifier);
    return (
      definition !== undefined &&
      others.length === 0 &&
      definition.roles.some((role) => role.kind === "memberAttribute")
    );
  }

  /**
   * Resolve every attribute of a declaration, in source order. A failure
   * never affects the other attributes. Failures on attributes without a
   * source position are located at the declaration, then at `anchor`.
   */
  resolve(
    declaration: AttachedDeclaration,
    declarationPath: string,
    anchor?: ts.Node
  ): AttributeResolution[] {
    const position = positionOf(declaration);
    return attributesOf(declaration).map((attribute, index) =>
      this.resolveOne(attribute, index, position, declarationPath, [declaration, anchor])
    );
  }

  private resolveOne(
    attribute: ts.Decorator,
    index: number,
    position: DeclarationPosition,
    declarationPath: string,
    fallbacks: readonly (ts.Node | undefined)[]
  ): AttributeResolution {
    const { sourceFile, emit, unknownAttributes } = this.options;
    const fail = (builder: DiagnosticBuilder): FailedAttribute => ({
      status: "failed",
      attribute,
      diagnostic: builder.at(attribute, ...fallbacks).in(declarationPath).emit(),
    });

    const parsed = parseDecorator(attribute);
    if (!parsed) {
      return { status: "ignored", attribute };
    }

    const spelled = parsed.qualifier ? `${parsed.qualifier}.${parsed.macroName}` : parsed.macroName;
    const candidates = this.visibleDefinitions(parsed.macroName, parsed.qualifier);

    if (candidates.length === 0) {
      if (unknownAttributes === "ignore") return { status: "ignored", attribute };
      return fail(new DiagnosticBuilder(HM1001, sourceFile, emit).withArgs({ name: spelled }));
    }

    const [definition, ...others] = candidates;
    if (definition === undefined || others.length > 0) {
      return fail(
        new DiagnosticBuilder(HM1002, sourceFile, emit)
          .withArgs({
            name: spelled,
            modules: candidates.map((d) => describeModule(d.module)).join(" and "),
          })
          .help(`import \`${parsed.macroName}\` by name from one module, or qualify it`)
      );
    }

    const roles = definition.roles.filter((role) => rolePositions(role).includes(position));
    if (roles.length === 0) {
      const allowed = [...new Set(definition.roles.flatMap((role) => rolePositions(role)))];
      return fail(
        new DiagnosticBuilder(HM1003, sourceFile, emit)
          .withArgs({ name: spelled, position: describePosition(position) })
          .note(`\`${definition.name}\` applies to: ${allowed.map(describePosition).join(", ")}`)
      );
    }

    const occurrence: AttributeOccurrence = {
      declarationPath,
      attribute,
      macroName: definition.name,
      qualifier: parsed.qualifier,
      arguments: parsed.args,
      index,
    };

    return { status: "resolved", occurrence, definition, roles };
  }
}
