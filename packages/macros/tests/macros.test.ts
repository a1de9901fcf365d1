import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import { createRegistry, declarationName, printNode } from "@hitch/core";
import type { MacroRegistry } from "@hitch/core";
import { expandSourceFile, type UnitExpansion } from "@hitch/expander";
import { registerStandardMacros, standardMacros } from "@hitch/macros";

function standardRegistry(): MacroRegistry {
  const registry = createRegistry();
  registerStandardMacros(registry);
  return registry;
}

function parse(code: string): ts.SourceFile {
  return ts.createSourceFile("test.ts", code, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
}

function expandFile(sourceFile: ts.SourceFile): UnitExpansion {
  return expandSourceFile(sourceFile, {
    registry: standardRegistry(),
    feedbackLimit: 100,
    unknownAttributes: "error",
    verbose: false,
  });
}

function expandCode(code: string): UnitExpansion {
  return expandFile(parse(code));
}

function classMembers(sourceFile: ts.SourceFile, name: string): readonly ts.ClassElement[] {
  for (const statement of sourceFile.statements) {
    if (ts.isClassDeclaration(statement) && statement.name?.text === name) return statement.members;
  }
  throw new Error(`no class ${name}`);
}

function memberNames(sourceFile: ts.SourceFile, name: string): string[] {
  return classMembers(sourceFile, name).map((m) => declarationName(m) ?? "?");
}

function memberAt(sourceFile: ts.SourceFile, name: string, index: number): string {
  const member = classMembers(sourceFile, name)[index];
  return member ? printNode(member, sourceFile) : "";
}

describe("registerStandardMacros", () => {
  it("should register every standard macro under the macros module", () => {
    const registry = standardRegistry();

    expect(registry.getAll().map((m) => m.name)).toEqual([
      "completionHandler",
      "dictionaryStorage",
      "storage",
      "equatable",
    ]);
    expect(standardMacros.every((m) => m.module === "@hitch/macros")).toBe(true);
  });
});

describe("@completionHandler", () => {
  it("should add a callback overload after an async function", () => {
    const { sourceFile, diagnostics } = expandCode(
      `import { completionHandler } from "@hitch/macros";
@completionHandler
async function f(x: number): Promise<string> {
  return String(x);
}`
    );

    expect(diagnostics).toEqual([]);
    expect(sourceFile.statements.map((s) => declarationName(s) ?? "?")).toEqual(["?", "f", "f"]);
    const overload = sourceFile.statements[2];
    expect(overload ? printNode(overload, sourceFile) : "").toBe(
      "function f(x: number, completionHandler: (result: string) => void) {\n    f(x).then(completionHandler);\n}"
    );
  });

  it("should forward through this for methods", () => {
    const { sourceFile, diagnostics } = expandCode(
      `import { completionHandler } from "@hitch/macros";
class Api {
  @completionHandler
  async load(id: string): Promise<number> {
    return id.length;
  }
}`
    );

    expect(diagnostics).toEqual([]);
    expect(memberNames(sourceFile, "Api")).toEqual(["load", "load"]);
    expect(memberAt(sourceFile, "Api", 1)).toBe(
      "load(id: string, completionHandler: (result: number) => void) {\n    this.load(id).then(completionHandler);\n}"
    );
  });

  it("should use unknown when the return type is not written", () => {
    const { sourceFile } = expandCode(
      `import { completionHandler } from "@hitch/macros";
@completionHandler
async function ping() {}`
    );

    const overload = sourceFile.statements[2];
    expect(overload ? printNode(overload, sourceFile) : "").toBe(
      "function ping(completionHandler: (result: unknown) => void) {\n    ping().then(completionHandler);\n}"
    );
  });

  it("should not attach to a synchronous function", () => {
    const { diagnostics, stats } = expandCode(
      `import { completionHandler } from "@hitch/macros";
@completionHandler
function f() {}`
    );

    expect(diagnostics.map((d) => d.message)).toEqual([
      "Macro `completionHandler` cannot be attached to a function",
    ]);
    expect(stats.fragments).toBe(0);
  });

  it("should report a return type that is not a promise", () => {
    const { diagnostics, stats } = expandCode(
      `import { completionHandler } from "@hitch/macros";
@completionHandler
async function f(): string {}`
    );

    expect(diagnostics.map((d) => d.message)).toEqual([
      "@completionHandler: `f` must return Promise<T>",
    ]);
    expect(diagnostics[0]?.kind).toBe("MacroReported");
    expect(stats.fragments).toBe(0);
  });

  it("should refuse a rest parameter", () => {
    const { diagnostics } = expandCode(
      `import { completionHandler } from "@hitch/macros";
@completionHandler
async function all(...ids: string[]): Promise<void> {}`
    );

    expect(diagnostics.map((d) => d.message)).toEqual([
      "@completionHandler cannot append a handler after a rest parameter",
    ]);
  });

  it("should be invisible without an import from the macros module", () => {
    const { diagnostics } = expandCode(`@completionHandler\nasync function f(): Promise<void> {}`);

    expect(diagnostics.map((d) => d.message)).toEqual(["No visible macro is named `completionHandler`"]);
  });
});

describe("@dictionaryStorage and @storage", () => {
  const settings = `import { dictionaryStorage } from "@hitch/macros";
@dictionaryStorage
class Settings {
  theme: string;
  fontSize: number;
  static version = 1;
}`;

  it("should move every stored property into the storage map", () => {
    const { sourceFile, diagnostics } = expandCode(settings);

    expect(diagnostics).toEqual([]);
    expect(memberNames(sourceFile, "Settings")).toEqual([
      "theme",
      "theme",
      "fontSize",
      "fontSize",
      "version",
      "_storage",
    ]);
    expect(memberAt(sourceFile, "Settings", 0)).toBe(
      'get theme(): string {\n    return this._storage.get("theme") as string;\n}'
    );
    expect(memberAt(sourceFile, "Settings", 3)).toBe(
      'set fontSize(value: number) {\n    this._storage.set("fontSize", value);\n}'
    );
    expect(memberAt(sourceFile, "Settings", 5)).toBe("private _storage = new Map<string, unknown>();");
  });

  it("should keep a storage field the class already declares", () => {
    const { sourceFile, diagnostics } = expandCode(
      `import { dictionaryStorage } from "@hitch/macros";
@dictionaryStorage
class Prefs {
  private _storage = new Map<string, unknown>();
  locale: string;
}`
    );

    expect(diagnostics).toEqual([]);
    expect(memberNames(sourceFile, "Prefs")).toEqual(["_storage", "locale", "locale"]);
  });

  it("should not add @storage twice", () => {
    const { sourceFile, diagnostics } = expandCode(
      `import { dictionaryStorage, storage } from "@hitch/macros";
@dictionaryStorage
class Prefs {
  @storage locale: string;
}`
    );

    expect(diagnostics).toEqual([]);
    expect(memberNames(sourceFile, "Prefs")).toEqual(["locale", "locale", "_storage"]);
  });

  it("should only emit a getter for a readonly property", () => {
    const { sourceFile } = expandCode(
      `import { storage } from "@hitch/macros";
class Doc {
  private _storage = new Map<string, unknown>();
  @storage readonly id: string;
}`
    );

    expect(memberNames(sourceFile, "Doc")).toEqual(["_storage", "id"]);
    expect(memberAt(sourceFile, "Doc", 1)).toBe(
      'get id(): string {\n    return this._storage.get("id") as string;\n}'
    );
  });

  it("should warn that an initializer is dropped", () => {
    const { sourceFile, diagnostics } = expandCode(
      `import { storage } from "@hitch/macros";
class Counter {
  private _storage = new Map<string, unknown>();
  @storage count: number = 0;
}`
    );

    expect(diagnostics.map((d) => [d.severity, d.message])).toEqual([
      ["warning", "@storage: the initializer of `count` is dropped; set it in the constructor instead"],
    ]);
    expect(memberNames(sourceFile, "Counter")).toEqual(["_storage", "count", "count"]);
  });
});

describe("@equatable", () => {
  it("should compare every stored property", () => {
    const { sourceFile, diagnostics } = expandCode(
      `import { equatable } from "@hitch/macros";
@equatable
class Point {
  x: number;
  y: number;
  static origin = 0;
}`
    );

    expect(diagnostics).toEqual([]);
    expect(memberNames(sourceFile, "Point")).toEqual(["x", "y", "origin", "equals"]);
    expect(memberAt(sourceFile, "Point", 3)).toBe(
      "equals(other: Point): boolean {\n    return this.x === other.x && this.y === other.y;\n}"
    );
  });

  it("should return true for a class without stored properties", () => {
    const { sourceFile } = expandCode(
      `import { equatable } from "@hitch/macros";
@equatable
class Unit {}`
    );

    expect(memberAt(sourceFile, "Unit", 0)).toBe("equals(other: Unit): boolean {\n    return true;\n}");
  });

  it("should keep a hand-written equals", () => {
    const code = `import { equatable } from "@hitch/macros";
@equatable
class Point {
  x: number;
  equals(other: Point): boolean {
    return false;
  }
}`;
    const sourceFile = parse(code);
    const original = classMembers(sourceFile, "Point")[1];
    const result = expandFile(sourceFile);

    expect(result.diagnostics).toEqual([]);
    expect(memberNames(result.sourceFile, "Point")).toEqual(["x", "equals"]);
    expect(classMembers(result.sourceFile, "Point")[1]).toBe(original);
  });

  it("should see the stored properties other macros leave behind", () => {
    const { sourceFile, diagnostics } = expandCode(
      `import { equatable, dictionaryStorage } from "@hitch/macros";
@equatable
@dictionaryStorage
class Settings {
  theme: string;
}`
    );

    expect(diagnostics).toEqual([]);
    expect(memberNames(sourceFile, "Settings")).toEqual(["theme", "theme", "_storage", "equals"]);
    expect(memberAt(sourceFile, "Settings", 3)).toBe(
      "equals(other: Settings): boolean {\n    return this._storage === other._storage;\n}"
    );
  });
});
