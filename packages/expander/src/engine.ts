/**
 * Attached-macro expander - the compilation driver's entry point
 *
 * Expands a unit batch by batch: each top-level statement that carries
 * attributes anywhere in its subtree is one batch. Statements without
 * attributes are kept as they are.
 *
 * @example
 * ```typescript
 * import { createRegistry } from "@hitch/core";
 * import { expandSource, printSourceFile } from "@hitch/expander";
 *
 * const registry = createRegistry();
 * registry.register(myMacro);
 *
 * const { sourceFile, diagnostics } = expandSource(code, "input.ts", { registry });
 * console.log(printSourceFile(sourceFile));
 * ```
 */

import * as ts from "typescript";
import type { MacroRegistry, RichDiagnostic, UnknownAttributePolicy } from "@hitch/core";
import {
  DiagnosticSink,
  UniqueNameAllocator,
  config,
  getPrinter,
  globalRegistry,
} from "@hitch/core";
import { MacroInvoker } from "./invoker.js";
import { AttributeResolver, scanImports } from "./resolver.js";
import { Batch } from "./scheduler.js";

export interface ExpanderOptions {
  /** Registry to resolve attributes against (default: the global registry) */
  registry?: MacroRegistry;
  /** Default: `expansion.feedbackLimit` from config */
  feedbackLimit?: number;
  /** Default: `expansion.unknownAttributes` from config */
  unknownAttributes?: UnknownAttributePolicy;
  /** Default: `verbose` from config */
  verbose?: boolean;
  /** Share unique names with another expander of the same run */
  allocator?: UniqueNameAllocator;
}

export interface ExpansionStats {
  /** Top-level statements that carried attributes */
  batches: number;
  /** Batches that merged at least one change */
  expandedBatches: number;
  /** Batches discarded by a batch-fatal error */
  abortedBatches: number;
  /** Macro invocations */
  requests: number;
  /** Fragments merged */
  fragments: number;
}

export interface UnitExpansion {
  readonly sourceFile: ts.SourceFile;
  readonly diagnostics: readonly RichDiagnostic[];
  readonly stats: ExpansionStats;
}

/** Whether any node under `node` (itself included) has a decorator */
function hasAttributes(node: ts.Node): boolean {
  if (ts.isDecorator(node)) return true;
  return ts.forEachChild(node, (child) => (hasAttributes(child) ? true : undefined)) ?? false;
}

export class AttachedMacroExpander {
  private readonly registry: MacroRegistry;
  private readonly allocator: UniqueNameAllocator;
  private readonly feedbackLimit: number;
  private readonly unknownAttributes: UnknownAttributePolicy;
  private readonly verbose: boolean;

  constructor(options: ExpanderOptions = {}) {
    this.registry = options.registry ?? globalRegistry;
    this.allocator = options.allocator ?? new UniqueNameAllocator();
    this.feedbackLimit = options.feedbackLimit ?? config.get("expansion.feedbackLimit");
    this.unknownAttributes = options.unknownAttributes ?? config.get("expansion.unknownAttributes");
    this.verbose = options.verbose ?? config.get("verbose");
  }

  expand(sourceFile: ts.SourceFile): UnitExpansion {
    const sink = new DiagnosticSink();
    const stats: ExpansionStats = {
      batches: 0,
      expandedBatches: 0,
      abortedBatches: 0,
      requests: 0,
      fragments: 0,
    };

    const resolver = new AttributeResolver({
      registry: this.registry,
      sourceFile,
      imports: scanImports(sourceFile),
      unknownAttributes: this.unknownAttributes,
      emit: sink.emitter,
    });
    const invoker = new MacroInvoker({ sourceFile, allocator: this.allocator, emit: sink.emitter });

    const pending = sourceFile.statements.filter(hasAttributes);
    if (this.verbose) {
      console.log(`[hitch] expanding ${sourceFile.fileName}: ${pending.length} batch(es)`);
    }

    let changed = false;
    const statements: ts.Statement[] = [];
    for (const statement of sourceFile.statements) {
      if (!pending.includes(statement)) {
        statements.push(statement);
        continue;
      }

      const outcome = new Batch(statement, {
        sourceFile,
        resolver,
        invoker,
        allocator: this.allocator,
        sink,
        feedbackLimit: this.feedbackLimit,
        verbose: this.verbose,
      }).run();

      stats.batches++;
      stats.requests += outcome.stats.requests;
      if (outcome.aborted) stats.abortedBatches++;
      if (outcome.changed) {
        stats.expandedBatches++;
        stats.fragments += outcome.stats.fragments;
        changed = true;
      }
      statements.push(...outcome.statements);
    }

    if (this.verbose && stats.abortedBatches > 0) {
      console.log(`[hitch] ${stats.abortedBatches} batch(es) left unexpanded in ${sourceFile.fileName}`);
    }

    return {
      sourceFile: changed ? ts.factory.updateSourceFile(sourceFile, statements) : sourceFile,
      diagnostics: sink.all(),
      stats,
    };
  }
}

export function expandSourceFile(sourceFile: ts.SourceFile, options: ExpanderOptions = {}): UnitExpansion {
  return new AttachedMacroExpander(options).expand(sourceFile);
}

/** Parse `text` and expand it */
export function expandSource(
  text: string,
  fileName = "input.ts",
  options: ExpanderOptions = {}
): UnitExpansion {
  const sourceFile = ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  return expandSourceFile(sourceFile, options);
}

export function printSourceFile(sourceFile: ts.SourceFile): string {
  return getPrinter().printFile(sourceFile);
}
