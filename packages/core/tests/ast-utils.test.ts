import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import {
  declarationName,
  getAttributes,
  introducedNames,
  isStoredProperty,
  parseAttribute,
  parseMembers,
  parseStatements,
  printNode,
} from "@hitch/core";

describe("parsing snippets", () => {
  it("should parse statements as synthetic nodes", () => {
    const [fn] = parseStatements("function greet() { return 'hi'; }");

    expect(fn && ts.isFunctionDeclaration(fn)).toBe(true);
    expect(fn?.pos).toBe(-1);
    expect(fn ? printNode(fn) : "").toBe('function greet() { return "hi"; }');
  });

  it("should parse class members", () => {
    const members = parseMembers("x = 1;\nget y() { return 2; }");

    expect(members.map((m) => ts.SyntaxKind[m.kind])).toEqual(["PropertyDeclaration", "GetAccessor"]);
  });

  it("should parse attributes with or without the @", () => {
    expect(printNode(parseAttribute("@traced"))).toBe("@traced");
    expect(printNode(parseAttribute('named("x")'))).toBe('@named("x")');
  });

  it("should reject malformed snippets", () => {
    expect(() => parseStatements("function (")).toThrow("Failed to parse statements");
    expect(() => parseAttribute("@a @b")).toThrow("Failed to parse attribute");
  });
});

describe("declarations", () => {
  const sourceFile = ts.createSourceFile(
    "decls.ts",
    [
      "@a @b.c(1) function f() {}",
      "@d namespace N { export const v = 1; }",
      "class C { x = 1; static y = 2; declare z: number; m() {} }",
      "const { p, q: [r] } = obj;",
      'import def, * as ns from "mod";',
    ].join("\n"),
    ts.ScriptTarget.Latest,
    true
  );
  const [fn, ns, cls, vars, imp] = sourceFile.statements;

  it("should read attributes on functions and namespaces", () => {
    expect(fn ? getAttributes(fn).map((d) => d.expression.getText(sourceFile)) : []).toEqual([
      "a",
      "b.c(1)",
    ]);
    expect(ns ? getAttributes(ns) : []).toHaveLength(1);
  });

  it("should name declarations", () => {
    expect(fn ? declarationName(fn) : undefined).toBe("f");
    expect(ns ? declarationName(ns) : undefined).toBe("N");
  });

  it("should list introduced names", () => {
    expect(vars ? introducedNames(vars) : []).toEqual(["p", "r"]);
    expect(imp ? introducedNames(imp) : []).toEqual(["def", "ns"]);
  });

  it("should tell stored properties from static and declared ones", () => {
    const members = cls && ts.isClassDeclaration(cls) ? cls.members : [];
    expect(members.map((m) => isStoredProperty(m))).toEqual([true, false, false, false]);
  });
});
