import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import { DiagnosticSink, defineAttachedMacro, names } from "@hitch/core";
import type { AttachedDeclaration, MacroRegistry, PeerRole, UnknownAttributePolicy } from "@hitch/core";
import { AttributeResolver, scanImports, type AttributeResolution } from "@hitch/expander";
import { parse, registryOf } from "./helpers.js";

const peer: PeerRole = { kind: "peer", names: [names.overloaded], expand: () => [] };

const traced = defineAttachedMacro({ name: "traced", roles: [peer] });
const observableA = defineAttachedMacro({ name: "observable", module: "pkg-a", roles: [peer] });
const observableB = defineAttachedMacro({ name: "observable", module: "pkg-b", roles: [peer] });
const store = defineAttachedMacro({
  name: "store",
  roles: [{ kind: "accessor", expand: () => [] }],
});

function lastDeclaration(sourceFile: ts.SourceFile): AttachedDeclaration {
  const last = sourceFile.statements[sourceFile.statements.length - 1];
  if (last && (ts.isClassDeclaration(last) || ts.isFunctionDeclaration(last))) return last;
  throw new Error("expected a class or function last");
}

function resolveIn(
  code: string,
  registry: MacroRegistry,
  unknownAttributes: UnknownAttributePolicy = "error"
): { resolutions: AttributeResolution[]; sink: DiagnosticSink } {
  const sourceFile = parse(code);
  const sink = new DiagnosticSink();
  const resolver = new AttributeResolver({
    registry,
    sourceFile,
    imports: scanImports(sourceFile),
    unknownAttributes,
    emit: sink.emitter,
  });
  return { resolutions: resolver.resolve(lastDeclaration(sourceFile), "Target"), sink };
}

function modulesOf(resolutions: AttributeResolution[]): (string | undefined)[] {
  return resolutions.map((r) => (r.status === "resolved" ? r.definition.module : "<unresolved>"));
}

describe("scanImports", () => {
  it("should collect modules, named bindings and namespaces", () => {
    const scope = scanImports(
      parse(`
import { observable as watch, traced } from "pkg-a";
import * as ui from "pkg-ui";
import "side-effect";
`)
    );

    expect([...scope.modules]).toEqual(["pkg-a", "pkg-ui", "side-effect"]);
    expect(scope.named.get("watch")).toEqual({ module: "pkg-a", imported: "observable" });
    expect(scope.named.get("traced")).toEqual({ module: "pkg-a", imported: "traced" });
    expect(scope.namespaces.get("ui")).toBe("pkg-ui");
  });
});

describe("AttributeResolver", () => {
  const registry = registryOf(traced, observableA, observableB, store);

  it("should resolve attributes in source order with their occurrence details", () => {
    const { resolutions, sink } = resolveIn(`@traced @traced("again") function f() {}`, registry);

    expect(sink.all()).toEqual([]);
    expect(resolutions.map((r) => r.status)).toEqual(["resolved", "resolved"]);
    const second = resolutions[1];
    expect(second?.status === "resolved" ? second.occurrence.index : -1).toBe(1);
    expect(second?.status === "resolved" ? second.occurrence.arguments.length : -1).toBe(1);
    expect(second?.status === "resolved" ? second.occurrence.declarationPath : "").toBe("Target");
  });

  it("should hide module-scoped macros from units that do not import the module", () => {
    const { resolutions, sink } = resolveIn(`@observable class C {}`, registry);

    expect(resolutions[0]?.status).toBe("failed");
    expect(sink.all().map((d) => d.message)).toEqual(["No visible macro is named `observable`"]);
    expect(sink.all()[0]?.kind).toBe("UnknownMacro");
  });

  it("should report a name exported by two imported modules as ambiguous", () => {
    const { sink } = resolveIn(
      `import "pkg-a";\nimport "pkg-b";\n@observable class C {}`,
      registry
    );

    expect(sink.all().map((d) => d.message)).toEqual([
      "`observable` is ambiguous: it is exported by 'pkg-a' and 'pkg-b'",
    ]);
    expect(sink.all()[0]?.code).toBe(1002);
  });

  it("should let a named import pick one module", () => {
    const { resolutions, sink } = resolveIn(
      `import { observable } from "pkg-b";\nimport "pkg-a";\n@observable class C {}`,
      registry
    );

    expect(sink.all()).toEqual([]);
    expect(modulesOf(resolutions)).toEqual(["pkg-b"]);
  });

  it("should follow import aliases to the exported name", () => {
    const { resolutions } = resolveIn(
      `import { observable as watch } from "pkg-a";\n@watch class C {}`,
      registry
    );

    const [first] = resolutions;
    expect(first?.status === "resolved" ? first.occurrence.macroName : "").toBe("observable");
    expect(modulesOf(resolutions)).toEqual(["pkg-a"]);
  });

  it("should resolve qualified attributes against namespace imports", () => {
    const { resolutions, sink } = resolveIn(
      `import * as a from "pkg-a";\nimport * as b from "pkg-b";\n@b.observable @a.observable class C {}`,
      registry
    );

    expect(sink.all()).toEqual([]);
    expect(modulesOf(resolutions)).toEqual(["pkg-b", "pkg-a"]);
  });

  it("should fail an attribute whose macro has no role for the position", () => {
    const { resolutions, sink } = resolveIn(`@store @traced class C {}`, registry);

    expect(resolutions.map((r) => r.status)).toEqual(["failed", "resolved"]);
    const [diagnostic] = sink.all();
    expect(diagnostic?.message).toBe("Macro `store` cannot be attached to a class");
    expect(diagnostic?.notes).toEqual(["`store` applies to: stored property"]);
    expect(diagnostic?.location).toEqual({ fileName: "test.ts", line: 1, column: 1 });
  });

  it("should narrow roles by their valid targets", () => {
    const asyncOnly = defineAttachedMacro({
      name: "asyncOnly",
      roles: [{ ...peer, validTargets: ["async-function"] }],
    });
    const { sink } = resolveIn(`@asyncOnly function f() {}`, registryOf(asyncOnly));

    expect(sink.all().map((d) => d.kind)).toEqual(["RoleNotApplicable"]);
  });

  it("should leave unknown decorators alone when told to ignore them", () => {
    const { resolutions, sink } = resolveIn(`@Component @traced class C {}`, registry, "ignore");

    expect(sink.all()).toEqual([]);
    expect(resolutions.map((r) => r.status)).toEqual(["ignored", "resolved"]);
  });

  it("should ignore decorators that are not macro attributes", () => {
    const { resolutions, sink } = resolveIn(`@(factory()) class C {}`, registry);

    expect(sink.all()).toEqual([]);
    expect(resolutions.map((r) => r.status)).toEqual(["ignored"]);
  });
});
