import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import { parseAttribute, printNode } from "@hitch/core";
import {
  attributesOf,
  describePosition,
  isStatementNode,
  isTypeDeclaration,
  parseDecorator,
  positionOf,
  syntaxKindName,
  withAttributes,
  withMembers,
} from "@hitch/expander";
import { classNamed, parse } from "./helpers.js";

const source = parse(`
@tracked("v1") export class Store {
  @field items = [];
  @run async load() {}
  save() {}
  get size() { return 0; }
}
@peer async function fetchAll() {}
namespace Util {}
let counter = 0;
`);

const store = classNamed(source, "Store");

describe("positions", () => {
  it("should classify each kind of declaration", () => {
    const [items, load, save, size] = store.members;
    const fetchAll = source.statements[1];
    const util = source.statements[2];

    expect(positionOf(store)).toBe("class");
    expect(items && ts.isPropertyDeclaration(items) ? positionOf(items) : undefined).toBe("stored-property");
    expect(load && ts.isMethodDeclaration(load) ? positionOf(load) : undefined).toBe("async-method");
    expect(save && ts.isMethodDeclaration(save) ? positionOf(save) : undefined).toBe("method");
    expect(size && ts.isGetAccessorDeclaration(size) ? positionOf(size) : undefined).toBe("computed-property");
    expect(fetchAll && ts.isFunctionDeclaration(fetchAll) ? positionOf(fetchAll) : undefined).toBe("async-function");
    expect(util && isTypeDeclaration(util) ? positionOf(util) : undefined).toBe("namespace");
  });

  it("should describe positions for messages", () => {
    expect(describePosition("stored-property")).toBe("stored property");
    expect(describePosition("class")).toBe("class");
  });

  it("should name syntax kinds without range aliases", () => {
    const variable = source.statements[3];
    expect(variable ? syntaxKindName(variable) : "").toBe("VariableStatement");
    expect(syntaxKindName(store)).toBe("ClassDeclaration");
  });

  it("should tell statements from class members", () => {
    const [items] = store.members;
    expect(isStatementNode(store)).toBe(true);
    expect(items ? isStatementNode(items) : true).toBe(false);
  });
});

describe("attributes", () => {
  it("should read decorators from functions as well as classes", () => {
    const fetchAll = source.statements[1];
    expect(attributesOf(store).map((d) => printNode(d, source))).toEqual(['@tracked("v1")']);
    expect(
      fetchAll && ts.isFunctionDeclaration(fetchAll) ? attributesOf(fetchAll).length : 0
    ).toBe(1);
  });

  it("should split attributes into name, qualifier and arguments", () => {
    const plain = parseDecorator(parseAttribute("@observable"));
    const called = parseDecorator(parseAttribute('@tracked("v1", 2)'));
    const qualified = parseDecorator(parseAttribute("@ui.bindable()"));

    expect(plain).toEqual({ macroName: "observable", args: [] });
    expect(called?.macroName).toBe("tracked");
    expect(called?.args).toHaveLength(2);
    expect(qualified?.qualifier).toBe("ui");
    expect(qualified?.macroName).toBe("bindable");
  });

  it("should not treat deeper property chains as macro attributes", () => {
    expect(parseDecorator(parseAttribute("@a.b.c"))).toBeUndefined();
    expect(parseDecorator(parseAttribute("@(factory())"))).toBeUndefined();
  });
});

describe("copy with replacement", () => {
  it("should replace attributes and keep other modifiers", () => {
    const copy = withAttributes(store, []);

    expect(copy).not.toBe(store);
    expect(attributesOf(copy)).toEqual([]);
    expect(copy.modifiers?.map((m) => m.kind)).toEqual([ts.SyntaxKind.ExportKeyword]);
    expect(store.modifiers).toHaveLength(2);
  });

  it("should put attributes before the other modifiers", () => {
    const copy = withAttributes(store, [parseAttribute("@sealed")]);
    expect(copy.modifiers?.map((m) => m.kind)).toEqual([
      ts.SyntaxKind.Decorator,
      ts.SyntaxKind.ExportKeyword,
    ]);
  });

  it("should replace the member list of a class", () => {
    const [, , save] = store.members;
    const copy = withMembers(store, save ? [save] : []);

    expect(ts.isClassDeclaration(copy) ? Array.from(copy.members) : []).toEqual([save]);
    expect(store.members).toHaveLength(4);
  });
});
