import { describe, expect, it } from "vitest";

import { normalizeProgram } from "../src/ir.ts";
import {
  canHaveMethods,
  functionUnderPtr,
  identicalTypes,
  implementsInterface,
  interfaceUnderPtr,
  lookupMethod,
  parseSignature,
  parseType,
  sliceArrayElem,
  typeString,
} from "../src/types.ts";
import type { IrType } from "../src/types.ts";

function render(text: string): string {
  return typeString(parseType(text));
}

function mustString(t: IrType | null): string {
  if (t === null) throw new Error("expected a type");
  return typeString(t);
}

describe("parseType / typeString", () => {
  it("renders composite types canonically", () => {
    expect(render("map[string]*P.C")).toBe("map[string]*P.C");
    expect(render("chan<- int")).toBe("chan<- int");
    expect(render("<-chan []P.I")).toBe("<-chan []P.I");
    expect(render("chan   int")).toBe("chan int");
    expect(render("[4]int")).toBe("[4]int");
    expect(render("func(int, ...string) (P.I, bool)")).toBe("func(int, ...string) (P.I, bool)");
    expect(render("func() int")).toBe("func() int");
    expect(render("struct{a int; b P.I}")).toBe("struct{a int; b P.I}");
    expect(render("(int, bool)")).toBe("(int, bool)");
  });

  it("sorts interface methods and treats any as the empty interface", () => {
    expect(render("interface{g(int) string; f()}")).toBe("interface{f(); g(int) string}");
    expect(render("any")).toBe("interface{}");
    expect(identicalTypes(parseType("any"), parseType("interface{}"))).toBe(true);
  });

  it("keeps type arguments in instantiated names", () => {
    const t = parseType("P.List[P.A, *P.B]");
    expect(t).toEqual({ kind: "named", name: "P.List[P.A,*P.B]" });
  });

  it("distinguishes basic from named types", () => {
    expect(parseType("int")).toEqual({ kind: "basic", name: "int" });
    expect(parseType("error")).toEqual({ kind: "named", name: "error" });
  });

  it("rejects malformed type text", () => {
    expect(() => parseType("map[int")).toThrow('Invalid type "map[int"');
    expect(() => parseType("")).toThrow("empty type");
    expect(() => parseType("int int")).toThrow('unexpected trailing token "int"');
    expect(() => parseType("func(...int, string)")).toThrow("variadic parameter must be last");
    expect(() => parseSignature("int")).toThrow('Expected a func type; got "int"');
  });
});

describe("method sets and interface satisfaction", () => {
  const program = normalizeProgram({
    schemaVersion: 1,
    types: [
      { name: "P.S", underlying: "struct{}", methods: [{ name: "m", func: "(*S).m" }] },
      { name: "P.T", underlying: "int", methods: [{ name: "n", func: "(T).n" }] },
      { name: "P.M", underlying: "interface{m()}" },
    ],
    functions: [
      { name: "(*S).m", recv: { name: "s", type: "*P.S" } },
      { name: "(T).n", recv: { name: "t", type: "P.T" } },
    ],
  });
  const table = program.types;
  const iface = parseType("interface{m()}");
  if (iface.kind !== "interface") throw new Error("expected an interface");

  it("gives T its value-receiver methods and *T all methods", () => {
    expect(lookupMethod(parseType("P.S"), "m", table)).toBeNull();
    expect(lookupMethod(parseType("*P.S"), "m", table)?.func).toBe("(*S).m");
    expect(lookupMethod(parseType("P.T"), "n", table)?.func).toBe("(T).n");
    expect(lookupMethod(parseType("*P.T"), "n", table)?.func).toBe("(T).n");
    expect(lookupMethod(parseType("*P.T"), "m", table)).toBeNull();
  });

  it("records whether a method has a pointer receiver", () => {
    expect(lookupMethod(parseType("*P.S"), "m", table)?.pointerReceiver).toBe(true);
    expect(lookupMethod(parseType("P.T"), "n", table)?.pointerReceiver).toBe(false);
  });

  it("checks interface satisfaction against method sets", () => {
    expect(implementsInterface(parseType("P.S"), iface, table)).toBe(false);
    expect(implementsInterface(parseType("*P.S"), iface, table)).toBe(true);
    expect(implementsInterface(parseType("P.T"), iface, table)).toBe(false);
    expect(implementsInterface(parseType("int"), { kind: "interface", methods: [] }, table)).toBe(true);
  });

  it("requires identical method signatures", () => {
    const other = parseType("interface{m(int)}");
    if (other.kind !== "interface") throw new Error("expected an interface");
    expect(implementsInterface(parseType("*P.S"), other, table)).toBe(false);
  });

  it("predeclares error", () => {
    expect(typeString(table.get("error")?.underlying ?? parseType("int"))).toBe("interface{Error() string}");
  });

  it("finds interfaces and functions behind pointers", () => {
    expect(mustString(interfaceUnderPtr(parseType("**P.M"), table))).toBe("P.M");
    expect(mustString(interfaceUnderPtr(parseType("*P.M"), table))).toBe("P.M");
    expect(interfaceUnderPtr(parseType("*P.T"), table)).toBeNull();
    expect(mustString(functionUnderPtr(parseType("**func()"), table))).toBe("func()");
    expect(functionUnderPtr(parseType("P.T"), table)).toBeNull();
  });

  it("classifies types that can carry methods", () => {
    expect(canHaveMethods(parseType("string"), table)).toBe(false);
    expect(canHaveMethods(parseType("P.T"), table)).toBe(true);
    expect(canHaveMethods(parseType("*P.T"), table)).toBe(true);
    expect(canHaveMethods(parseType("struct{}"), table)).toBe(true);
    expect(canHaveMethods(parseType("*int"), table)).toBe(false);
  });

  it("finds slice and array elements", () => {
    expect(mustString(sliceArrayElem(parseType("[]P.M"), table))).toBe("P.M");
    expect(mustString(sliceArrayElem(parseType("*[3]int"), table))).toBe("int");
    expect(sliceArrayElem(parseType("string"), table)).toBeNull();
  });
});
