import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import {
  DiagnosticBuilder,
  DiagnosticSink,
  DIAGNOSTIC_CATALOG,
  HM1001,
  HM4002,
  colorsEnabled,
  descriptorFor,
  getDiagnosticDescriptor,
  renderDiagnosticCLI,
  renderDiagnosticsCLI,
  printDiagnostics,
  DiagnosticCategory,
  getDiagnosticsByCategory,
} from "@hitch/core";

const text = "class A {}\n@missing\nclass B {}\n";

function decoratorOfB(sourceFile: ts.SourceFile): ts.Decorator {
  const statement = sourceFile.statements[1];
  if (!statement || !ts.isClassDeclaration(statement)) throw new Error("expected class B");
  const decorator = statement.modifiers?.find(ts.isDecorator);
  if (!decorator) throw new Error("expected a decorator");
  return decorator;
}

describe("DiagnosticBuilder", () => {
  const sourceFile = ts.createSourceFile("demo.ts", text, ts.ScriptTarget.Latest, true);

  it("should interpolate arguments and locate the node", () => {
    const sink = new DiagnosticSink();
    const diagnostic = new DiagnosticBuilder(HM1001, sourceFile, sink.emitter)
      .at(decoratorOfB(sourceFile))
      .in("B")
      .withArgs({ name: "missing" })
      .emit();

    expect(diagnostic.message).toBe("No visible macro is named `missing`");
    expect(diagnostic.kind).toBe("UnknownMacro");
    expect(diagnostic.location).toEqual({ fileName: "demo.ts", line: 2, column: 1 });
    expect(diagnostic.declarationPath).toBe("B");
    expect(sink.all()).toEqual([diagnostic]);
    expect(sink.hasErrors()).toBe(true);
  });

  it("should leave synthesized nodes without a location", () => {
    const sink = new DiagnosticSink();
    const synthetic = ts.factory.createIdentifier("generated");
    const diagnostic = new DiagnosticBuilder(HM4002, sourceFile, sink.emitter)
      .at(synthetic)
      .withArgs({ message: "something odd" })
      .severity("warning")
      .emit();

    expect(diagnostic.location).toBeUndefined();
    expect(diagnostic.primarySpan).toBeUndefined();
    expect(diagnostic.message).toBe("something odd");
    expect(sink.hasErrors()).toBe(false);
  });

  it("should fall back to the first positioned node", () => {
    const sink = new DiagnosticSink();
    const synthetic = ts.factory.createIdentifier("generated");
    const classA = sourceFile.statements[0];
    const diagnostic = new DiagnosticBuilder(HM1001, sourceFile, sink.emitter)
      .at(synthetic, undefined, classA)
      .withArgs({ name: "generated" })
      .emit();

    expect(diagnostic.location).toEqual({ fileName: "demo.ts", line: 1, column: 1 });
    expect(diagnostic.primarySpan?.node).toBe(classA);
  });

  it("should drop diagnostics after a mark on truncate", () => {
    const sink = new DiagnosticSink();
    new DiagnosticBuilder(HM4002, sourceFile, sink.emitter).withArgs({ message: "a" }).emit();
    const mark = sink.size;
    new DiagnosticBuilder(HM4002, sourceFile, sink.emitter).withArgs({ message: "b" }).emit();

    expect(sink.since(mark).map((d) => d.message)).toEqual(["b"]);
    sink.truncate(mark);
    expect(sink.all().map((d) => d.message)).toEqual(["a"]);
  });
});

describe("catalog", () => {
  it("should index every descriptor by code", () => {
    expect(getDiagnosticDescriptor(1001)).toBe(HM1001);
    expect(getDiagnosticDescriptor(42)).toBeUndefined();
    expect(DIAGNOSTIC_CATALOG.size).toBe(12);
  });

  it("should find descriptors by kind", () => {
    expect(descriptorFor("DependencyCycle").code).toBe(3001);
    expect(descriptorFor("InvalidRoleCombination").code).toBe(5001);
  });

  it("should group descriptors by category", () => {
    expect(getDiagnosticsByCategory(DiagnosticCategory.Scheduling).map((d) => d.kind)).toEqual([
      "DependencyCycle",
      "NonterminatingExpansion",
    ]);
  });
});

describe("renderDiagnosticCLI", () => {
  const sourceFile = ts.createSourceFile("demo.ts", text, ts.ScriptTarget.Latest, true);

  it("should render a Rust-style excerpt", () => {
    const sink = new DiagnosticSink();
    const diagnostic = new DiagnosticBuilder(HM1001, sourceFile, sink.emitter)
      .at(decoratorOfB(sourceFile))
      .in("B")
      .withArgs({ name: "missing" })
      .help("register the macro")
      .emit();

    expect(renderDiagnosticCLI(diagnostic, { colors: false }).split("\n")).toEqual([
      "error[HM1001]: No visible macro is named `missing`",
      "  --> demo.ts:2:1",
      "    |",
      "  1 | class A {}",
      "  2 | @missing",
      "    | ^^^^^^^^",
      "  3 | class B {}",
      "    |",
      "   = note: in B",
      "   = help: register the macro",
    ]);
  });

  it("should color output when asked", () => {
    const sink = new DiagnosticSink();
    const diagnostic = new DiagnosticBuilder(HM4002, sourceFile, sink.emitter)
      .withArgs({ message: "plain" })
      .emit();

    expect(renderDiagnosticCLI(diagnostic, { colors: true })).toBe(
      "\x1b[1m\x1b[31merror[HM4002]\x1b[0m: \x1b[1mplain\x1b[0m"
    );
  });

  it("should summarize several diagnostics", () => {
    const sink = new DiagnosticSink();
    new DiagnosticBuilder(HM4002, sourceFile, sink.emitter).withArgs({ message: "one" }).emit();
    new DiagnosticBuilder(HM4002, sourceFile, sink.emitter)
      .withArgs({ message: "two" })
      .severity("warning")
      .emit();

    expect(renderDiagnosticsCLI(sink.all(), { colors: false })).toBe(
      ["error[HM4002]: one", "", "warning[HM4002]: two", "", "1 error, 1 warning generated"].join(
        "\n"
      )
    );
    expect(renderDiagnosticsCLI([], { colors: false })).toBe("");
  });

  it("should hand the rendered summary to a writer", () => {
    const sink = new DiagnosticSink();
    new DiagnosticBuilder(HM4002, sourceFile, sink.emitter).withArgs({ message: "one" }).emit();
    const written: string[] = [];

    printDiagnostics(sink.all(), { colors: false, writer: (line) => written.push(line) });

    expect(written).toEqual(["error[HM4002]: one\n\n1 error generated"]);
  });

  it("should honor NO_COLOR and FORCE_COLOR", () => {
    expect(colorsEnabled({})).toBe(true);
    expect(colorsEnabled({ NO_COLOR: "1" })).toBe(false);
    expect(colorsEnabled({ HITCH_NO_COLOR: "1" })).toBe(false);
    expect(colorsEnabled({ FORCE_COLOR: "0" })).toBe(false);
  });
});
