import { describe, expect, it } from "vitest";

import { callGraphLines } from "../src/call_graph.ts";
import { staticCallGraph } from "../src/cha.ts";
import type { IrProgram } from "../src/ir.ts";
import { buildTypePropGraph, nodeFromValue } from "../src/vta_builder.ts";
import { computeVtaCallGraph } from "../src/vta.ts";
import { vtaGraphLines } from "../src/vta_graph.ts";
import { nodeString } from "../src/vta_node.ts";
import { programOf } from "./helpers.ts";

function graphLines(program: IrProgram): string[] {
  return vtaGraphLines(buildTypePropGraph(program, staticCallGraph(program)).graph);
}

function vtaLines(program: IrProgram): string[] {
  return callGraphLines(computeVtaCallGraph(program, { baseline: staticCallGraph(program) }).callGraph);
}

const boxC = (dst: string) => ({ op: "make_interface", dst, type: "P.I", x: { const: "P.C" } });

describe("nodeFromValue", () => {
  const program = programOf([], {
    globals: [
      { name: "gi", type: "P.I" },
      { name: "gn", type: "int" },
    ],
  });

  it("maps values to nodes by kind and pointer shape", () => {
    const s = (v: Parameters<typeof nodeFromValue>[0]): string => nodeString(nodeFromValue(v, program));
    const ptr = (elem: string) => ({ kind: "const" as const, type: { kind: "pointer" as const, elem: { kind: "named" as const, name: elem } } });

    expect(s({ kind: "global", name: "gi", type: { kind: "pointer", elem: { kind: "named", name: "P.I" } } })).toBe("Global(gi)");
    expect(s({ kind: "global", name: "gn", type: { kind: "pointer", elem: { kind: "basic", name: "int" } } })).toBe("Pointer(*int)");
    expect(s(ptr("P.C"))).toBe("Pointer(*P.C)");
    expect(s(ptr("P.I"))).toBe("Constant(*P.I)");
    expect(
      s({ kind: "const", type: { kind: "pointer", elem: { kind: "pointer", elem: { kind: "named", name: "P.I" } } } }),
    ).toBe("PtrInterface(P.I)");
    expect(s({ kind: "const", type: { kind: "named", name: "P.C" } })).toBe("Constant(P.C)");
  });
});

describe("buildTypePropGraph", () => {
  it("adds the fixed panic to recover edge", () => {
    expect(graphLines(programOf([]))).toEqual(["Panic -> Recover"]);
  });

  it("connects stores and loads through pointers to interfaces", () => {
    const program = programOf([
      {
        name: "g",
        instrs: [
          { op: "alloc", dst: "t0", type: "*P.I" },
          boxC("t1"),
          { op: "store", addr: "t0", value: "t1" },
          { op: "load", dst: "t2", type: "P.I", x: "t0" },
          { op: "call", invoke: { recv: "t2", method: "f" } },
          { op: "return" },
        ],
      },
    ]);
    expect(graphLines(program)).toEqual([
      "Constant(P.C) -> Local(t1)",
      "Local(t0) -> Local(t2)",
      "Local(t1) -> Local(t0)",
      "Panic -> Recover",
    ]);
    expect(vtaLines(program)).toEqual(["g -> (C).f"]);
  });

  it("treats struct fields as shared slots", () => {
    const program = programOf(
      [
        {
          name: "h",
          params: [{ name: "x", type: "*P.X" }],
          instrs: [
            { op: "field_addr", dst: "t0", type: "*P.I", x: "x", field: 0 },
            boxC("t1"),
            { op: "store", addr: "t0", value: "t1" },
            { op: "return" },
          ],
        },
      ],
      {
        types: [
          { name: "P.I", underlying: "interface{f()}" },
          { name: "P.C", underlying: "int", methods: [{ name: "f", func: "(C).f" }] },
          { name: "P.X", underlying: "struct{a P.I; b int}" },
        ],
      },
    );
    expect(graphLines(program)).toEqual([
      "Constant(P.C) -> Local(t1)",
      "Field(P.X:a) -> Local(t0)",
      "Local(t0) -> Field(P.X:a)",
      "Local(t1) -> Local(t0)",
      "Panic -> Recover",
    ]);
  });

  it("routes map updates and comma-ok lookups through map value slots", () => {
    const program = programOf([
      {
        name: "m",
        instrs: [
          { op: "make_map", dst: "t0", type: "map[string]P.I" },
          boxC("t1"),
          { op: "map_update", map: "t0", key: { const: "string" }, value: "t1" },
          { op: "lookup", dst: "t2", type: "(P.I, bool)", x: "t0", key: { const: "string" }, commaOk: true },
          { op: "extract", dst: "t3", type: "P.I", tuple: "t2", tupleIndex: 0 },
          { op: "return" },
        ],
      },
    ]);
    expect(graphLines(program)).toEqual([
      "Constant(P.C) -> Local(t1)",
      "Local(t1) -> MapValue(P.I)",
      "Local(t2[0]) -> Local(t3), MapValue(P.I)",
      "MapValue(P.I) -> Local(t1), Local(t2[0])",
      "Panic -> Recover",
    ]);
  });

  it("routes sends, receives and select receives through channel slots", () => {
    const program = programOf([
      {
        name: "ch",
        instrs: [
          { op: "make_chan", dst: "t0", type: "chan P.I" },
          boxC("t1"),
          { op: "send", chan: "t0", x: "t1" },
          { op: "select", dst: "t2", type: "(int, bool, P.I)", states: [{ dir: "recv", chan: "t0" }] },
          { op: "recv", dst: "t3", type: "P.I", chan: "t0" },
          { op: "return" },
        ],
      },
    ]);
    expect(graphLines(program)).toEqual([
      "Channel(chan P.I) -> Local(t1), Local(t2[2]), Local(t3)",
      "Constant(P.C) -> Local(t1)",
      "Local(t1) -> Channel(chan P.I)",
      "Local(t2[2]) -> Channel(chan P.I)",
      "Local(t3) -> Channel(chan P.I)",
      "Panic -> Recover",
    ]);
  });

  it("flows arguments into parameters and results into call destinations", () => {
    const program = programOf([
      { name: "mk", results: ["P.I"], instrs: [boxC("a0"), { op: "return", results: ["a0"] }] },
      {
        name: "two",
        results: ["P.I", "error"],
        instrs: [boxC("b0"), { op: "return", results: ["b0", { const: "error" }] }],
      },
      {
        name: "use",
        params: [{ name: "p", type: "P.I" }],
        instrs: [{ op: "call", invoke: { recv: "p", method: "f" } }, { op: "return" }],
      },
      {
        name: "main",
        instrs: [
          { op: "call", dst: "t0", type: "P.I", value: { func: "mk" } },
          { op: "call", dst: "t1", type: "(P.I, error)", value: { func: "two" } },
          { op: "call", value: { func: "use" }, args: ["t0"] },
          { op: "return" },
        ],
      },
    ]);
    expect(graphLines(program)).toEqual([
      "Constant(P.C) -> Local(a0), Local(b0)",
      "Constant(error) -> Return(two[1])",
      "Local(a0) -> Return(mk[0])",
      "Local(b0) -> Return(two[0])",
      "Local(t0) -> Local(p)",
      "Panic -> Recover",
      "Return(mk[0]) -> Local(t0)",
      "Return(two[0]) -> Local(t1[0])",
      "Return(two[1]) -> Local(t1[1])",
    ]);
    expect(vtaLines(program)).toEqual(["main -> mk", "main -> two", "main -> use", "use -> (C).f"]);
  });

  it("binds closure free variables to the captured values", () => {
    const program = programOf([
      {
        name: "outer",
        params: [{ name: "x", type: "P.I" }],
        instrs: [
          { op: "make_closure", dst: "t0", type: "func()", fn: "outer$1", bindings: ["x"] },
          { op: "call", value: "t0" },
          { op: "return" },
        ],
      },
      {
        name: "outer$1",
        freeVars: [{ name: "fv", type: "P.I" }],
        instrs: [{ op: "call", invoke: { recv: "fv", method: "f" } }, { op: "return" }],
      },
      {
        name: "main2",
        instrs: [boxC("c0"), { op: "call", value: { func: "outer" }, args: ["c0"] }, { op: "return" }],
      },
    ]);
    expect(graphLines(program)).toEqual([
      "Constant(P.C) -> Local(c0)",
      "Function(outer$1) -> Local(t0)",
      "Local(c0) -> Local(x)",
      "Local(x) -> Local(fv)",
      "Panic -> Recover",
    ]);
    expect(vtaLines(program)).toEqual(["main2 -> outer", "outer -> outer$1", "outer$1 -> (C).f"]);
  });

  it("sends every panic value to every recover", () => {
    const program = programOf([
      {
        name: "thrower",
        instrs: [boxC("t0"), { op: "panic", x: "t0" }, { op: "panic", x: { const: "string" } }],
      },
      {
        name: "catcher",
        instrs: [
          { op: "call", dst: "r0", type: "interface{}", builtin: "recover" },
          { op: "type_assert", dst: "r1", type: "(P.I, bool)", x: "r0", assertedType: "P.I", commaOk: true },
          { op: "extract", dst: "r2", type: "P.I", tuple: "r1", tupleIndex: 0 },
          { op: "call", invoke: { recv: "r2", method: "f" } },
          { op: "return" },
        ],
      },
    ]);
    expect(graphLines(program)).toEqual([
      "Constant(P.C) -> Local(t0)",
      "Local(r0) -> Local(r1[0])",
      "Local(r1[0]) -> Local(r2)",
      "Local(t0) -> Panic",
      "Panic -> Recover",
      "Recover -> Local(r0)",
    ]);
    expect(vtaLines(program)).toEqual(["catcher -> (C).f"]);
  });

  it("lets callees write through pointer parameters back to the caller", () => {
    const program = programOf([
      {
        name: "set",
        params: [{ name: "p", type: "*P.I" }],
        instrs: [boxC("s0"), { op: "store", addr: "p", value: "s0" }, { op: "return" }],
      },
      {
        name: "main",
        instrs: [
          { op: "alloc", dst: "t0", type: "*P.I" },
          { op: "call", value: { func: "set" }, args: ["t0"] },
          { op: "load", dst: "t1", type: "P.I", x: "t0" },
          { op: "call", invoke: { recv: "t1", method: "f" } },
          { op: "return" },
        ],
      },
    ]);
    expect(graphLines(program)).toEqual([
      "Constant(P.C) -> Local(s0)",
      "Local(p) -> Local(t0)",
      "Local(s0) -> Local(p)",
      "Local(t0) -> Local(p), Local(t1)",
      "Panic -> Recover",
    ]);
    expect(vtaLines(program)).toEqual(["main -> (C).f", "main -> set"]);
  });

  it("skips argument flows into functions without a body", () => {
    const program = programOf([
      { name: "ext", params: [{ name: "p", type: "*P.I" }], instrs: [] },
      {
        name: "main",
        instrs: [
          { op: "alloc", dst: "t0", type: "*P.I" },
          { op: "call", value: { func: "ext" }, args: ["t0"] },
          { op: "return" },
        ],
      },
    ]);
    expect(graphLines(program)).toEqual(["Panic -> Recover"]);
  });

  it("gives go and defer calls no result flow", () => {
    const program = programOf([
      { name: "mk", results: ["P.I"], instrs: [boxC("a0"), { op: "return", results: ["a0"] }] },
      {
        name: "use",
        params: [{ name: "p", type: "P.I" }],
        instrs: [{ op: "call", invoke: { recv: "p", method: "f" } }, { op: "return" }],
      },
      {
        name: "gd",
        instrs: [
          boxC("v0"),
          { op: "go", value: { func: "use" }, args: ["v0"] },
          { op: "defer", value: { func: "mk" } },
          { op: "return" },
        ],
      },
    ]);
    expect(graphLines(program)).toEqual([
      "Constant(P.C) -> Local(a0), Local(v0)",
      "Local(a0) -> Return(mk[0])",
      "Local(v0) -> Local(p)",
      "Panic -> Recover",
    ]);
    expect(vtaLines(program)).toEqual(["gd -> mk", "gd -> use", "use -> (C).f"]);
  });

  it("shares slice and array elements, but not string bytes", () => {
    const program = programOf([
      {
        name: "sl",
        params: [
          { name: "xs", type: "[]P.I" },
          { name: "arr", type: "[2]P.I" },
          { name: "s", type: "string" },
          { name: "i", type: "int" },
        ],
        instrs: [
          { op: "index_addr", dst: "t0", type: "*P.I", x: "xs", at: "i" },
          { op: "index", dst: "t1", type: "P.I", x: "arr", at: "i" },
          { op: "index", dst: "t2", type: "uint8", x: "s", at: "i" },
          { op: "return" },
        ],
      },
    ]);
    expect(graphLines(program)).toEqual([
      "Local(t0) -> Slice([]P.I)",
      "Local(t1) -> Slice([]P.I)",
      "Panic -> Recover",
      "Slice([]P.I) -> Local(t0), Local(t1)",
    ]);
  });

  it("routes map iteration through key and value slots", () => {
    const program = programOf([
      {
        name: "it",
        params: [
          { name: "mp", type: "map[P.I]P.I" },
          { name: "s", type: "string" },
        ],
        instrs: [
          { op: "next", dst: "t0", type: "(bool, P.I, P.I)", iter: "mp" },
          { op: "next", dst: "t1", type: "(bool, int, rune)", iter: "s", isString: true },
          { op: "return" },
        ],
      },
    ]);
    expect(graphLines(program)).toEqual([
      "Local(t0[1]) -> MapKey(P.I)",
      "Local(t0[2]) -> MapValue(P.I)",
      "MapKey(P.I) -> Local(t0[1])",
      "MapValue(P.I) -> Local(t0[2])",
      "Panic -> Recover",
    ]);
  });

  it("aliases type changes and flows interface changes and plain assertions forward", () => {
    const program = programOf(
      [
        {
          name: "conv",
          params: [
            { name: "p", type: "*P.I" },
            { name: "e", type: "error" },
            { name: "a", type: "interface{}" },
          ],
          instrs: [
            { op: "change_type", dst: "t0", type: "P.PI", x: "p" },
            { op: "change_interface", dst: "t1", type: "interface{}", x: "e" },
            { op: "type_assert", dst: "t2", type: "P.I", x: "a", assertedType: "P.I" },
            { op: "return" },
          ],
        },
      ],
      {
        types: [
          { name: "P.I", underlying: "interface{f()}" },
          { name: "P.C", underlying: "int", methods: [{ name: "f", func: "(C).f" }] },
          { name: "P.PI", underlying: "*P.I" },
        ],
      },
    );
    expect(graphLines(program)).toEqual([
      "Local(a) -> Local(t2)",
      "Local(e) -> Local(t1)",
      "Local(p) -> Local(t0)",
      "Local(t0) -> Local(p)",
      "Panic -> Recover",
    ]);
  });

  it("routes select sends through channel slots", () => {
    const program = programOf([
      {
        name: "ss",
        params: [{ name: "c", type: "chan P.I" }],
        instrs: [
          boxC("v0"),
          { op: "select", dst: "t0", type: "(int, bool)", states: [{ dir: "send", chan: "c", send: "v0" }] },
          { op: "recv", dst: "t1", type: "P.I", chan: "c" },
          { op: "call", invoke: { recv: "t1", method: "f" } },
          { op: "return" },
        ],
      },
    ]);
    expect(graphLines(program)).toEqual([
      "Channel(chan P.I) -> Local(t1), Local(v0)",
      "Constant(P.C) -> Local(v0)",
      "Local(t1) -> Channel(chan P.I)",
      "Local(v0) -> Channel(chan P.I)",
      "Panic -> Recover",
    ]);
    expect(vtaLines(program)).toEqual(["ss -> (C).f"]);
  });

  it("stores into and loads from interface and function globals", () => {
    const program = programOf(
      [
        {
          name: "gs",
          instrs: [
            boxC("v0"),
            { op: "store", addr: { global: "gi" }, value: "v0" },
            { op: "load", dst: "t0", type: "P.I", x: { global: "gi" } },
            { op: "call", invoke: { recv: "t0", method: "f" } },
            { op: "store", addr: { global: "gf" }, value: { func: "gs2" } },
            { op: "load", dst: "t1", type: "func()", x: { global: "gf" } },
            { op: "call", value: "t1" },
            { op: "return" },
          ],
        },
        { name: "gs2", instrs: [{ op: "return" }] },
      ],
      {
        globals: [
          { name: "gi", type: "P.I" },
          { name: "gf", type: "func()" },
        ],
      },
    );
    expect(graphLines(program)).toEqual([
      "Constant(P.C) -> Local(v0)",
      "Function(gs2) -> Global(gf)",
      "Global(gf) -> Local(t1)",
      "Global(gi) -> Local(t0)",
      "Local(v0) -> Global(gi)",
      "Panic -> Recover",
    ]);
    expect(vtaLines(program)).toEqual(["gs -> (C).f", "gs -> gs2"]);
  });

  it("collapses pointers to function pointers into one node", () => {
    const program = programOf([
      {
        name: "np",
        params: [
          { name: "pp", type: "**func()" },
          { name: "pf", type: "*func()" },
        ],
        instrs: [
          { op: "store", addr: "pp", value: "pf" },
          { op: "load", dst: "t0", type: "*func()", x: "pp" },
          { op: "return" },
        ],
      },
    ]);
    expect(graphLines(program)).toEqual([
      "Local(pf) -> PtrFunction(func())",
      "Local(t0) -> PtrFunction(func())",
      "Panic -> Recover",
      "PtrFunction(func()) -> Local(pf), Local(t0)",
    ]);
  });

  it("records dynamic and static call sites", () => {
    const program = programOf([
      {
        name: "g",
        params: [{ name: "p", type: "P.I" }, { name: "fn", type: "func()" }],
        instrs: [
          { op: "call", invoke: { recv: "p", method: "f" } },
          { op: "call", value: "fn" },
          { op: "call", value: { func: "g2" } },
          { op: "call", builtin: "len", args: ["p"] },
        ],
      },
      { name: "g2", instrs: [{ op: "return" }] },
    ]);
    const build = buildTypePropGraph(program, staticCallGraph(program));
    expect(
      build.dynamicSites.map((s) => ({ site: s.site, kind: s.kind, operand: nodeString(s.operand), method: s.method })),
    ).toEqual([
      { site: "c:g:0", kind: "invoke", operand: "Local(p)", method: "f" },
      { site: "c:g:1", kind: "func_value", operand: "Local(fn)", method: null },
    ]);
    expect(build.staticSites).toEqual([{ site: "c:g:2", caller: "g", callee: "g2" }]);
  });

  it("reports malformed instructions with their location", () => {
    const fieldOfInt = programOf([
      {
        name: "bad",
        params: [{ name: "x", type: "*int" }],
        instrs: [{ op: "field_addr", dst: "t0", type: "*int", x: "x", field: 0 }],
      },
    ]);
    expect(() => graphLines(fieldOfInt)).toThrow("bad#0 (field_addr): expected a struct operand; got int");

    const sendOnInt = programOf([
      { name: "bad2", params: [{ name: "x", type: "int" }], instrs: [{ op: "send", chan: "x", x: "x" }] },
    ]);
    expect(() => graphLines(sendOnInt)).toThrow("bad2#0 (send): expected a channel operand; got int");

    const extractFromInt = programOf([
      {
        name: "bad3",
        params: [{ name: "x", type: "int" }],
        instrs: [{ op: "extract", dst: "t0", type: "int", tuple: "x", tupleIndex: 0 }],
      },
    ]);
    expect(() => graphLines(extractFromInt)).toThrow("bad3#0 (extract): expected a tuple result; got int");
  });
});
