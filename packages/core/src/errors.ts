import { HM5001, type DiagnosticDescriptor } from "./diagnostics.js";

/**
 * Thrown by `MacroRegistry.register` when a definition's roles cannot be
 * registered together. Lists every problem found, not just the first.
 */
export class MacroDefinitionError extends Error {
  readonly descriptor: DiagnosticDescriptor = HM5001;
  readonly kind = "InvalidRoleCombination" as const;

  constructor(
    readonly macroName: string,
    readonly problems: readonly string[]
  ) {
    super(
      `[HM${HM5001.code}] Macro '${macroName}' declares an invalid role combination:\n` +
        problems.map((problem) => `  - ${problem}`).join("\n")
    );
    this.name = "MacroDefinitionError";
  }
}
