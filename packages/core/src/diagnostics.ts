/**
 * Diagnostics System for hitch
 *
 * Every failure the engine can report is a catalog entry with a stable code.
 * Diagnostics are built fluently and collected in a sink; nothing in the
 * expansion pipeline throws for a macro failure.
 *
 * @example
 * ```typescript
 * new DiagnosticBuilder(HM1001, sourceFile, sink.emitter)
 *   .at(decorator)
 *   .withArgs({ name: "observable" })
 *   .help("Import the macro's module, or register the macro")
 *   .emit();
 * ```
 */

import type * as ts from "typescript";

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Resolution = "resolution",
  Naming = "naming",
  Scheduling = "scheduling",
  MacroExpansion = "expansion",
  Registration = "registration",
  Internal = "internal",
}

export type DiagnosticKind =
  | "UnknownMacro"
  | "AmbiguousMacro"
  | "RoleNotApplicable"
  | "InvalidIntroducedName"
  | "WitnessStoredProperty"
  | "InvalidFragment"
  | "DependencyCycle"
  | "NonterminatingExpansion"
  | "MacroImplementationError"
  | "MacroReported"
  | "InvalidRoleCombination"
  | "Internal";

export type Severity = "error" | "warning" | "info";

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  readonly code: number;
  readonly kind: DiagnosticKind;

  /** Default severity (can be overridden per-emit) */
  readonly severity: Severity;

  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for --explain */
  readonly explanation: string;
}

// ============================================================================
// Rich Diagnostic Types
// ============================================================================

export interface DiagnosticLocation {
  readonly fileName: string;
  /** 1-based */
  readonly line: number;
  /** 1-based */
  readonly column: number;
}

export interface RichDiagnostic {
  code: number;
  kind: DiagnosticKind;
  severity: Severity;
  category: DiagnosticCategory;

  /** Primary message (with placeholders interpolated) */
  message: string;

  /**
   * The node the diagnostic points at. Only set for nodes that still have a
   * position in the original source text.
   */
  primarySpan?: {
    node: ts.Node;
    sourceFile: ts.SourceFile;
  };

  location?: DiagnosticLocation;

  /** Declaration the diagnostic belongs to, e.g. "Store.items" */
  declarationPath?: string;

  /** Macro whose expansion produced the diagnostic */
  macroName?: string;

  notes: string[];
  help?: string;
  explanation?: string;
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for constructing rich diagnostics.
 */
export class DiagnosticBuilder {
  private diagnostic: RichDiagnostic;
  private args: Record<string, string> = {};

  constructor(
    private readonly descriptor: DiagnosticDescriptor,
    private readonly sourceFile: ts.SourceFile,
    private readonly emitter: (diagnostic: RichDiagnostic) => void
  ) {
    this.diagnostic = {
      code: descriptor.code,
      kind: descriptor.kind,
      severity: descriptor.severity,
      category: descriptor.category,
      message: descriptor.messageTemplate,
      notes: [],
      explanation: descriptor.explanation,
    };
  }

  /**
   * Point the diagnostic at the first node that has a position in the source
   * text. Synthesized nodes are skipped in favour of the fallbacks; with none
   * left the location stays unset and the declaration path identifies it.
   */
  at(node: ts.Node | undefined, ...fallbacks: readonly (ts.Node | undefined)[]): this {
    const positioned = [node, ...fallbacks].find(
      (candidate): candidate is ts.Node =>
        candidate !== undefined && candidate.pos >= 0 && candidate.end <= this.sourceFile.text.length
    );
    if (positioned) {
      this.diagnostic.primarySpan = { node: positioned, sourceFile: this.sourceFile };
      const { line, character } = this.sourceFile.getLineAndCharacterOfPosition(
        positioned.getStart(this.sourceFile)
      );
      this.diagnostic.location = {
        fileName: this.sourceFile.fileName,
        line: line + 1,
        column: character + 1,
      };
    }
    return this;
  }

  in(declarationPath: string, macroName?: string): this {
    this.diagnostic.declarationPath = declarationPath;
    if (macroName !== undefined) this.diagnostic.macroName = macroName;
    return this;
  }

  /**
   * Provide arguments for message template interpolation.
   */
  withArgs(args: Record<string, string | number | undefined>): this {
    for (const [key, value] of Object.entries(args)) {
      if (value !== undefined) {
        this.args[key] = String(value);
      }
    }
    return this;
  }

  note(message: string): this {
    this.diagnostic.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.diagnostic.help = message;
    return this;
  }

  severity(severity: Severity): this {
    this.diagnostic.severity = severity;
    return this;
  }

  private interpolateMessage(): string {
    let message = this.descriptor.messageTemplate;
    for (const [key, value] of Object.entries(this.args)) {
      message = message.split(`{${key}}`).join(value);
    }
    return message;
  }

  /**
   * Emit the diagnostic via the registered emitter.
   */
  emit(): RichDiagnostic {
    this.diagnostic.message = this.interpolateMessage();
    this.emitter(this.diagnostic);
    return this.diagnostic;
  }
}

// ============================================================================
// Diagnostic Sink
// ============================================================================

/** Collects diagnostics in emission order */
export class DiagnosticSink {
  private readonly items: RichDiagnostic[] = [];

  readonly emitter = (diagnostic: RichDiagnostic): void => {
    this.items.push(diagnostic);
  };

  all(): readonly RichDiagnostic[] {
    return this.items;
  }

  /** Diagnostics emitted since `mark` */
  since(mark: number): readonly RichDiagnostic[] {
    return this.items.slice(mark);
  }

  get size(): number {
    return this.items.length;
  }

  hasErrors(): boolean {
    return this.items.some((d) => d.severity === "error");
  }

  /** Drop everything emitted after `mark` */
  truncate(mark: number): void {
    this.items.length = Math.min(this.items.length, mark);
  }
}

// ============================================================================
// Error Catalog: Resolution (1001-1099)
// ============================================================================

export const HM1001: DiagnosticDescriptor = {
  code: 1001,
  kind: "UnknownMacro",
  severity: "error",
  category: DiagnosticCategory.Resolution,
  messageTemplate: "No visible macro is named `{name}`",
  explanation: `An attribute was found that does not name any registered macro visible in
this file.

A macro registered with a module is only visible in files that import from
that module:

  import { observable } from "@acme/observation";

  @observable
  class Model {}

Set expansion.unknownAttributes to "ignore" to leave ordinary decorators alone.`,
};

export const HM1002: DiagnosticDescriptor = {
  code: 1002,
  kind: "AmbiguousMacro",
  severity: "error",
  category: DiagnosticCategory.Resolution,
  messageTemplate: "`{name}` is ambiguous: it is exported by {modules}",
  explanation: `More than one visible module exports a macro with this name.

Import the macro by name from one module, or qualify it with a namespace
import:

  import * as obs from "@acme/observation";

  @obs.observable
  class Model {}`,
};

export const HM1003: DiagnosticDescriptor = {
  code: 1003,
  kind: "RoleNotApplicable",
  severity: "error",
  category: DiagnosticCategory.Resolution,
  messageTemplate: "Macro `{name}` cannot be attached to a {position}",
  explanation: `None of the macro's roles may occupy this position.

  peer             any declaration
  member           class, namespace
  memberAttribute  class, namespace
  accessor         stored property

A role's validTargets narrows these positions further.`,
};

// ============================================================================
// Error Catalog: Naming & Fragments (2001-2099)
// ============================================================================

export const HM2001: DiagnosticDescriptor = {
  code: 2001,
  kind: "InvalidIntroducedName",
  severity: "error",
  category: DiagnosticCategory.Naming,
  messageTemplate:
    "Macro `{macro}` introduced `{introduced}`, which its {role} role does not declare",
  explanation: `Each role lists the names it may introduce:

  overloaded      the target's own name
  prefixed(p)     p + the target's name
  suffixed(s)     the target's name + s
  named(n)        exactly n
  arbitrary       any name

Names from makeUniqueName are always allowed. The offending fragment is dropped;
the macro's other fragments are kept.`,
};

export const HM2002: DiagnosticDescriptor = {
  code: 2002,
  kind: "WitnessStoredProperty",
  severity: "error",
  category: DiagnosticCategory.Naming,
  messageTemplate: "Default-witness macro `{macro}` cannot add stored property `{introduced}`",
  explanation: `Default-witness member roles run after every other expansion and read the
final stored-property list. Adding storage would invalidate what they read.`,
};

export const HM2003: DiagnosticDescriptor = {
  code: 2003,
  kind: "InvalidFragment",
  severity: "error",
  category: DiagnosticCategory.Naming,
  messageTemplate: "Macro `{macro}` produced {fragment}, which cannot be placed {placement}",
  explanation: `Fragments must fit where their role puts them: class elements inside a class,
statements inside a namespace or next to a top-level declaration, and get/set
accessors named like the property for accessor roles.`,
};

// ============================================================================
// Error Catalog: Scheduling (3001-3099)
// ============================================================================

export const HM3001: DiagnosticDescriptor = {
  code: 3001,
  kind: "DependencyCycle",
  severity: "error",
  category: DiagnosticCategory.Scheduling,
  messageTemplate: "Macro expansions depend on each other in a cycle: {path}",
  explanation: `An expansion read data (stored properties or members) that another expansion
produces, and that expansion in turn depends on the first. The whole top-level
declaration is left unexpanded.`,
};

export const HM3002: DiagnosticDescriptor = {
  code: 3002,
  kind: "NonterminatingExpansion",
  severity: "error",
  category: DiagnosticCategory.Scheduling,
  messageTemplate: "Expansion of `{declaration}` does not terminate: {reason}",
  explanation: `Macros kept producing attributes or declarations that fed back into expansion.
The batch stops after expansion.feedbackLimit rounds, or as soon as a
declaration returns to a state it was already in. The whole top-level
declaration is left unexpanded.`,
};

// ============================================================================
// Error Catalog: Macro Expansion (4001-4099)
// ============================================================================

export const HM4001: DiagnosticDescriptor = {
  code: 4001,
  kind: "MacroImplementationError",
  severity: "error",
  category: DiagnosticCategory.MacroExpansion,
  messageTemplate: "Macro `{macro}` ({role}) threw: {error}",
  explanation: `The macro's expansion function threw. Its output for this attribute is
discarded; other attributes still expand.`,
};

export const HM4002: DiagnosticDescriptor = {
  code: 4002,
  kind: "MacroReported",
  severity: "error",
  category: DiagnosticCategory.MacroExpansion,
  messageTemplate: "{message}",
  explanation: `Reported by a macro through its expansion context.`,
};

// ============================================================================
// Error Catalog: Registration (5001-5099)
// ============================================================================

export const HM5001: DiagnosticDescriptor = {
  code: 5001,
  kind: "InvalidRoleCombination",
  severity: "error",
  category: DiagnosticCategory.Registration,
  messageTemplate: "Macro `{name}` declares an invalid role combination",
  explanation: `A macro definition was rejected when it was registered. Each role kind may
appear once, must be able to occupy at least one position, and accessor roles
cannot be combined with member roles that add storage.`,
};

// ============================================================================
// Error Catalog: Internal (9999)
// ============================================================================

export const HM9999: DiagnosticDescriptor = {
  code: 9999,
  kind: "Internal",
  severity: "error",
  category: DiagnosticCategory.Internal,
  messageTemplate: "Internal expansion error: {message}",
  explanation: `The expander itself failed. This is a bug in hitch.`,
};

// ============================================================================
// Catalog Lookup
// ============================================================================

export const DIAGNOSTIC_CATALOG: Map<number, DiagnosticDescriptor> = new Map(
  [HM1001, HM1002, HM1003, HM2001, HM2002, HM2003, HM3001, HM3002, HM4001, HM4002, HM5001, HM9999].map(
    (d) => [d.code, d]
  )
);

export function getDiagnosticDescriptor(code: number): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

export function getDiagnosticsByCategory(category: DiagnosticCategory): DiagnosticDescriptor[] {
  return [...DIAGNOSTIC_CATALOG.values()].filter((d) => d.category === category);
}

/** Catalog entry for a kind */
export function descriptorFor(kind: DiagnosticKind): DiagnosticDescriptor {
  for (const descriptor of DIAGNOSTIC_CATALOG.values()) {
    if (descriptor.kind === kind) return descriptor;
  }
  return HM9999;
}

// ============================================================================
// CLI Renderer: Rust-Style Error Output
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or HITCH_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

type Style = keyof typeof COLORS;

export function colorsEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return !env.NO_COLOR && !env.HITCH_NO_COLOR && env.FORCE_COLOR !== "0";
}

function severityColor(severity: Severity): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

function getLineAndColumn(
  sourceFile: ts.SourceFile,
  pos: number
): { line: number; column: number } {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(pos);
  return { line: line + 1, column: character + 1 };
}

function getLineText(sourceFile: ts.SourceFile, lineNumber: number): string {
  const lines = sourceFile.text.split("\n");
  return lines[lineNumber - 1] ?? "";
}

export interface CLIRenderOptions {
  /** Whether to use colors (default: auto-detect from the environment) */
  colors?: boolean;
  /** Context lines before/after the error (default: 1) */
  contextLines?: number;
  /** Whether to show the explanation (default: false) */
  showExplanation?: boolean;
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
}

/**
 * Render a RichDiagnostic in Rust-style format.
 *
 * @example Output:
 * ```
 * error[HM1001]: No visible macro is named `observabel`
 *   --> src/model.ts:3:1
 *    |
 *  3 | @observabel
 *    | ^^^^^^^^^^^
 *    |
 *    = note: in Model
 * ```
 */
export function renderDiagnosticCLI(
  diagnostic: RichDiagnostic,
  options: CLIRenderOptions = {}
): string {
  const { contextLines = 1, showExplanation = false } = options;
  const useColors = options.colors ?? colorsEnabled();
  const color = (text: string, ...styles: Style[]): string =>
    useColors ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const lines: string[] = [];
  const severityClr = severityColor(diagnostic.severity);

  lines.push(
    `${color(`${diagnostic.severity}[HM${diagnostic.code}]`, "bold", severityClr)}: ${color(diagnostic.message, "bold")}`
  );

  if (diagnostic.location) {
    const { fileName, line, column } = diagnostic.location;
    lines.push(`  ${color("-->", "blue")} ${fileName}:${line}:${column}`);
  }

  if (diagnostic.primarySpan) {
    const { node, sourceFile } = diagnostic.primarySpan;
    const startPos = getLineAndColumn(sourceFile, node.getStart(sourceFile));
    const endPos = getLineAndColumn(sourceFile, node.getEnd());

    const minLine = Math.max(1, startPos.line - contextLines);
    const maxLine = Math.min(
      endPos.line + contextLines,
      sourceFile.getLineAndCharacterOfPosition(sourceFile.text.length).line + 1
    );
    const numWidth = Math.max(2, String(maxLine).length);
    const gutter = " ".repeat(numWidth);

    lines.push(` ${gutter} ${color("|", "blue")}`);

    for (let lineNum = minLine; lineNum <= maxLine; lineNum++) {
      const lineText = getLineText(sourceFile, lineNum);
      lines.push(
        ` ${color(String(lineNum).padStart(numWidth, " "), "blue")} ${color("|", "blue")} ${lineText}`
      );

      if (lineNum >= startPos.line && lineNum <= endPos.line) {
        const lineStartCol = lineNum === startPos.line ? startPos.column : 1;
        const lineEndCol = lineNum === endPos.line ? endPos.column : lineText.length + 1;
        const underline =
          " ".repeat(lineStartCol - 1) + "^".repeat(Math.max(1, lineEndCol - lineStartCol));
        lines.push(` ${gutter} ${color("|", "blue")} ${color(underline, severityClr)}`);
      }
    }

    lines.push(` ${gutter} ${color("|", "blue")}`);
  }

  if (diagnostic.declarationPath) {
    lines.push(`   ${color("= note:", "bold")} in ${diagnostic.declarationPath}`);
  }

  for (const note of diagnostic.notes) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }

  if (diagnostic.help) {
    lines.push(`   ${color("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  if (showExplanation && diagnostic.explanation) {
    lines.push("");
    lines.push(color("Explanation:", "bold"));
    for (const expLine of diagnostic.explanation.split("\n")) {
      lines.push(`  ${expLine}`);
    }
  }

  return lines.join("\n");
}

/**
 * Render multiple diagnostics with a summary.
 */
export function renderDiagnosticsCLI(
  diagnostics: readonly RichDiagnostic[],
  options: CLIRenderOptions = {}
): string {
  if (diagnostics.length === 0) {
    return "";
  }

  const useColors = options.colors ?? colorsEnabled();
  const color = (text: string, ...styles: Style[]): string =>
    useColors ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const lines: string[] = [];

  for (const diag of diagnostics) {
    lines.push(renderDiagnosticCLI(diag, { ...options, colors: useColors }));
    lines.push("");
  }

  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warnCount = diagnostics.filter((d) => d.severity === "warning").length;

  const parts: string[] = [];
  if (errorCount > 0) {
    parts.push(color(`${errorCount} error${errorCount > 1 ? "s" : ""}`, "bold", "red"));
  }
  if (warnCount > 0) {
    parts.push(color(`${warnCount} warning${warnCount > 1 ? "s" : ""}`, "bold", "yellow"));
  }

  if (parts.length > 0) {
    lines.push(`${parts.join(", ")} generated`);
  }

  return lines.join("\n");
}

/**
 * Print multiple diagnostics with a summary.
 */
export function printDiagnostics(
  diagnostics: readonly RichDiagnostic[],
  options: CLIRenderOptions = {}
): void {
  const writer = options.writer ?? ((line: string) => console.error(line));
  writer(renderDiagnosticsCLI(diagnostics, options));
}
