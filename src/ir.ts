import { readFileSync } from "node:fs";

import { stableSort } from "./determinism.ts";
import { cmpFuncId, createFuncId } from "./ids.ts";
import type { FuncId } from "./ids.ts";
import {
  ERROR_METHOD_SIGNATURE,
  ERROR_TYPE_NAME,
  parseType,
  typeString,
} from "./types.ts";
import type { IrType, MethodEntry, NamedTypeDecl, SignatureType, TypeTable } from "./types.ts";

export const PROGRAM_SCHEMA_VERSION = 1 as const;

export type ProgramSchemaVersion = typeof PROGRAM_SCHEMA_VERSION;

export type IrRegisterOrigin = "param" | "free_var" | "instr";

export type IrRegister = Readonly<{
  kind: "reg";
  func: FuncId;
  name: string;
  type: IrType;
  origin: IrRegisterOrigin;
}>;

export type IrValue =
  | IrRegister
  | Readonly<{ kind: "const"; type: IrType }>
  // Globals are addresses: `type` is a pointer to the declared type.
  | Readonly<{ kind: "global"; name: string; type: IrType }>
  | Readonly<{ kind: "func"; id: FuncId; type: SignatureType }>;

export type IrCallTarget =
  | Readonly<{ kind: "value"; value: IrValue }>
  | Readonly<{ kind: "invoke"; receiver: IrValue; method: string }>
  | Readonly<{ kind: "builtin"; name: string }>;

export type IrCallMode = "call" | "go" | "defer";

export type IrSelectState =
  | Readonly<{ dir: "send"; chan: IrValue; send: IrValue }>
  | Readonly<{ dir: "recv"; chan: IrValue }>;

export type IrInstr =
  | Readonly<{ kind: "alloc" | "make_map" | "make_slice" | "make_chan"; index: number; dst: IrRegister }>
  | Readonly<{ kind: "load"; index: number; dst: IrRegister; x: IrValue }>
  | Readonly<{ kind: "store"; index: number; addr: IrValue; value: IrValue }>
  | Readonly<{ kind: "recv"; index: number; dst: IrRegister; chan: IrValue; commaOk: boolean }>
  | Readonly<{ kind: "unop" | "convert" | "slice"; index: number; dst: IrRegister; x: IrValue }>
  | Readonly<{ kind: "binop"; index: number; dst: IrRegister; x: IrValue; y: IrValue }>
  | Readonly<{
      kind: "change_type" | "change_interface" | "make_interface";
      index: number;
      dst: IrRegister;
      x: IrValue;
    }>
  | Readonly<{ kind: "make_closure"; index: number; dst: IrRegister; fn: FuncId; bindings: readonly IrValue[] }>
  | Readonly<{ kind: "phi"; index: number; dst: IrRegister; edges: readonly IrValue[] }>
  | Readonly<{
      kind: "type_assert";
      index: number;
      dst: IrRegister;
      x: IrValue;
      assertedType: IrType;
      commaOk: boolean;
    }>
  | Readonly<{ kind: "extract"; index: number; dst: IrRegister; tuple: IrValue; tupleIndex: number }>
  | Readonly<{ kind: "field" | "field_addr"; index: number; dst: IrRegister; x: IrValue; field: number }>
  | Readonly<{ kind: "index" | "index_addr"; index: number; dst: IrRegister; x: IrValue; at: IrValue }>
  | Readonly<{ kind: "lookup"; index: number; dst: IrRegister; x: IrValue; key: IrValue; commaOk: boolean }>
  | Readonly<{ kind: "map_update"; index: number; map: IrValue; key: IrValue; value: IrValue }>
  | Readonly<{ kind: "next"; index: number; dst: IrRegister; iter: IrValue; isString: boolean }>
  | Readonly<{ kind: "send"; index: number; chan: IrValue; x: IrValue }>
  | Readonly<{
      kind: "select";
      index: number;
      dst: IrRegister;
      states: readonly IrSelectState[];
    }>
  | Readonly<{
      kind: "call";
      index: number;
      mode: IrCallMode;
      dst: IrRegister | null;
      target: IrCallTarget;
      args: readonly IrValue[];
    }>
  | Readonly<{ kind: "panic"; index: number; x: IrValue }>
  | Readonly<{ kind: "return"; index: number; results: readonly IrValue[] }>
  | Readonly<{ kind: "jump"; index: number }>
  | Readonly<{ kind: "if"; index: number; cond: IrValue }>;

export type IrCallInstr = Extract<IrInstr, { kind: "call" }>;

export type IrGlobal = Readonly<{ name: string; type: IrType }>;

export type IrFunction = Readonly<{
  id: FuncId;
  hasReceiver: boolean;
  // Receiver first for methods.
  params: readonly IrRegister[];
  freeVars: readonly IrRegister[];
  // Without the receiver.
  signature: SignatureType;
  // Enumeration order is instruction index order.
  instrs: readonly IrInstr[];
  // Registers defined by `make_closure`, mapped to the closure's function.
  closureFns: ReadonlyMap<string, FuncId>;
  // No body available (declared only).
  external: boolean;
}>;

export type IrProgram = Readonly<{
  schemaVersion: ProgramSchemaVersion;
  types: TypeTable;
  globals: ReadonlyMap<string, IrGlobal>;
  // Canonical ordering is by FuncId.
  functions: readonly IrFunction[];
  functionById: ReadonlyMap<FuncId, IrFunction>;
}>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== "object") return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function expectPlainObject(value: unknown, label: string): Record<string, unknown> {
  if (!isPlainObject(value)) {
    const t = value === null ? "null" : typeof value;
    throw new Error(`${label} must be a plain object; got ${t}`);
  }
  return value;
}

function expectString(value: unknown, label: string): string {
  if (typeof value !== "string") throw new Error(`${label} must be a string`);
  return value;
}

function expectNonEmptyString(value: unknown, label: string): string {
  const s = expectString(value, label);
  if (s.length === 0) throw new Error(`${label} must be a non-empty string`);
  return s;
}

function expectBoolean(value: unknown, label: string): boolean {
  if (typeof value !== "boolean") throw new Error(`${label} must be a boolean`);
  return value;
}

function expectOptionalBoolean(value: unknown, label: string): boolean {
  return value === undefined ? false : expectBoolean(value, label);
}

function expectNonNegativeSafeInt(value: unknown, label: string): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    throw new Error(`${label} must be a non-negative safe integer; got ${JSON.stringify(value)}`);
  }
  return value;
}

function expectArray(value: unknown, label: string): unknown[] {
  if (!Array.isArray(value)) throw new Error(`${label} must be an array`);
  return value;
}

function expectOptionalArray(value: unknown, label: string): unknown[] {
  return value === undefined ? [] : expectArray(value, label);
}

function assertNoExtraKeys(obj: Record<string, unknown>, allowed: readonly string[], label: string): void {
  const allowedSet = new Set(allowed);
  for (const k of Object.keys(obj)) {
    if (!allowedSet.has(k)) throw new Error(`${label} has unknown key ${JSON.stringify(k)}`);
  }
}

function parseTypeAt(value: unknown, label: string): IrType {
  const text = expectNonEmptyString(value, label);
  try {
    return parseType(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${label}: ${msg}`);
  }
}

function assertKnownTypes(t: IrType, table: ReadonlyMap<string, unknown>, label: string): void {
  switch (t.kind) {
    case "basic":
      return;
    case "named":
      if (!table.has(t.name)) throw new Error(`${label} references unknown named type ${JSON.stringify(t.name)}`);
      return;
    case "pointer":
    case "slice":
    case "array":
    case "chan":
      assertKnownTypes(t.elem, table, label);
      return;
    case "map":
      assertKnownTypes(t.key, table, label);
      assertKnownTypes(t.elem, table, label);
      return;
    case "struct":
      for (const f of t.fields) assertKnownTypes(f.type, table, label);
      return;
    case "interface":
      for (const m of t.methods) assertKnownTypes(m.signature, table, label);
      return;
    case "signature":
      for (const p of t.params) assertKnownTypes(p, table, label);
      for (const r of t.results) assertKnownTypes(r, table, label);
      return;
    case "tuple":
      for (const e of t.elems) assertKnownTypes(e, table, label);
      return;
  }
}

type RawNamedType = Readonly<{
  name: string;
  underlying: IrType;
  methods: ReadonlyArray<Readonly<{ name: string; func: FuncId; pointerReceiver: boolean | null; label: string }>>;
  label: string;
}>;

function normalizeNamedTypeRaw(value: unknown, label: string): RawNamedType {
  const obj = expectPlainObject(value, label);
  assertNoExtraKeys(obj, ["name", "underlying", "methods"], label);

  const nameType = parseTypeAt(obj.name, `${label}.name`);
  if (nameType.kind !== "named") {
    throw new Error(`${label}.name must name a type, not a builtin or composite; got ${JSON.stringify(obj.name)}`);
  }
  const underlying = parseTypeAt(obj.underlying, `${label}.underlying`);

  const rawMethods = expectOptionalArray(obj.methods, `${label}.methods`);
  const methods: Array<RawNamedType["methods"][number]> = [];
  const seen = new Set<string>();
  for (let i = 0; i < rawMethods.length; i++) {
    const ml = `${label}.methods[${i}]`;
    const m = expectPlainObject(rawMethods[i], ml);
    assertNoExtraKeys(m, ["name", "func", "pointerReceiver"], ml);
    const name = expectNonEmptyString(m.name, `${ml}.name`);
    if (seen.has(name)) throw new Error(`${label}.methods contains duplicate method ${JSON.stringify(name)}`);
    seen.add(name);
    const func = createFuncId(expectNonEmptyString(m.func, `${ml}.func`));
    const pointerReceiver = m.pointerReceiver === undefined ? null : expectBoolean(m.pointerReceiver, `${ml}.pointerReceiver`);
    methods.push({ name, func, pointerReceiver, label: ml });
  }

  return { name: nameType.name, underlying, methods, label };
}

function resolveUnderlying(name: string, rawByName: ReadonlyMap<string, RawNamedType>): IrType {
  const visited = new Set<string>();
  let current = name;
  for (;;) {
    if (visited.has(current)) throw new Error(`Named type ${JSON.stringify(name)} has a cyclic underlying type`);
    visited.add(current);
    const raw = rawByName.get(current);
    if (!raw) throw new Error(`Named type ${JSON.stringify(name)} has unknown underlying type ${JSON.stringify(current)}`);
    if (raw.underlying.kind !== "named") return raw.underlying;
    if (raw.underlying.name === ERROR_TYPE_NAME) {
      return { kind: "interface", methods: [{ name: "Error", signature: ERROR_METHOD_SIGNATURE }] };
    }
    current = raw.underlying.name;
  }
}

type RawParam = Readonly<{ name: string; type: IrType }>;

type RawFunction = Readonly<{
  id: FuncId;
  recv: RawParam | null;
  params: readonly RawParam[];
  freeVars: readonly RawParam[];
  results: readonly IrType[];
  variadic: boolean;
  instrs: readonly unknown[];
  label: string;
}>;

function normalizeParam(value: unknown, label: string): RawParam {
  const obj = expectPlainObject(value, label);
  assertNoExtraKeys(obj, ["name", "type"], label);
  return {
    name: expectNonEmptyString(obj.name, `${label}.name`),
    type: parseTypeAt(obj.type, `${label}.type`),
  };
}

function normalizeFunctionRaw(value: unknown, label: string): RawFunction {
  const obj = expectPlainObject(value, label);
  assertNoExtraKeys(obj, ["name", "recv", "params", "freeVars", "results", "variadic", "instrs"], label);

  const id = createFuncId(expectNonEmptyString(obj.name, `${label}.name`));
  const recv = obj.recv === undefined || obj.recv === null ? null : normalizeParam(obj.recv, `${label}.recv`);
  const params = expectOptionalArray(obj.params, `${label}.params`).map((p, i) =>
    normalizeParam(p, `${label}.params[${i}]`),
  );
  const freeVars = expectOptionalArray(obj.freeVars, `${label}.freeVars`).map((p, i) =>
    normalizeParam(p, `${label}.freeVars[${i}]`),
  );
  const results = expectOptionalArray(obj.results, `${label}.results`).map((r, i) =>
    parseTypeAt(r, `${label}.results[${i}]`),
  );
  const variadic = expectOptionalBoolean(obj.variadic, `${label}.variadic`);
  if (variadic) {
    const last = params[params.length - 1];
    if (!last || last.type.kind !== "slice") {
      throw new Error(`${label}.variadic requires a final slice-typed parameter`);
    }
  }
  const instrs = expectOptionalArray(obj.instrs, `${label}.instrs`);

  return { id, recv, params, freeVars, results, variadic, instrs, label };
}

const RESULTLESS_OPS = new Set(["store", "map_update", "send", "panic", "return", "jump", "if", "go", "defer"]);

type FunctionScope = Readonly<{
  funcId: FuncId;
  registers: ReadonlyMap<string, IrRegister>;
  globals: ReadonlyMap<string, IrGlobal>;
  signatures: ReadonlyMap<FuncId, SignatureType>;
  table: TypeTable;
}>;

function normalizeValue(value: unknown, scope: FunctionScope, label: string): IrValue {
  if (typeof value === "string") {
    const reg = scope.registers.get(value);
    if (!reg) throw new Error(`${label} references unknown register ${JSON.stringify(value)}`);
    return reg;
  }

  const obj = expectPlainObject(value, label);
  const keys = Object.keys(obj);
  if (keys.length !== 1) {
    throw new Error(`${label} must be a register name or one of {const}, {global}, {func}`);
  }

  if (obj.const !== undefined) {
    const type = parseTypeAt(obj.const, `${label}.const`);
    assertKnownTypes(type, scope.table, `${label}.const`);
    return { kind: "const", type };
  }

  if (obj.global !== undefined) {
    const name = expectNonEmptyString(obj.global, `${label}.global`);
    const g = scope.globals.get(name);
    if (!g) throw new Error(`${label} references unknown global ${JSON.stringify(name)}`);
    return { kind: "global", name, type: { kind: "pointer", elem: g.type } };
  }

  if (obj.func !== undefined) {
    const id = createFuncId(expectNonEmptyString(obj.func, `${label}.func`));
    const sig = scope.signatures.get(id);
    if (!sig) throw new Error(`${label} references unknown function ${JSON.stringify(id)}`);
    return { kind: "func", id, type: sig };
  }

  throw new Error(`${label} must be a register name or one of {const}, {global}, {func}`);
}

function normalizeCallTarget(obj: Record<string, unknown>, scope: FunctionScope, label: string): IrCallTarget {
  const present = ["value", "invoke", "builtin"].filter((k) => obj[k] !== undefined);
  if (present.length !== 1) {
    throw new Error(`${label} must have exactly one of "value", "invoke", "builtin"`);
  }

  if (obj.value !== undefined) return { kind: "value", value: normalizeValue(obj.value, scope, `${label}.value`) };

  if (obj.invoke !== undefined) {
    const inv = expectPlainObject(obj.invoke, `${label}.invoke`);
    assertNoExtraKeys(inv, ["recv", "method"], `${label}.invoke`);
    const receiver = normalizeValue(inv.recv, scope, `${label}.invoke.recv`);
    const method = expectNonEmptyString(inv.method, `${label}.invoke.method`);
    return { kind: "invoke", receiver, method };
  }

  return { kind: "builtin", name: expectNonEmptyString(obj.builtin, `${label}.builtin`) };
}

function normalizeSelectState(value: unknown, scope: FunctionScope, label: string): IrSelectState {
  const obj = expectPlainObject(value, label);
  const dir = expectString(obj.dir, `${label}.dir`);
  if (dir === "send") {
    assertNoExtraKeys(obj, ["dir", "chan", "send"], label);
    return {
      dir: "send",
      chan: normalizeValue(obj.chan, scope, `${label}.chan`),
      send: normalizeValue(obj.send, scope, `${label}.send`),
    };
  }
  if (dir === "recv") {
    assertNoExtraKeys(obj, ["dir", "chan"], label);
    return { dir: "recv", chan: normalizeValue(obj.chan, scope, `${label}.chan`) };
  }
  throw new Error(`${label}.dir must be "send" or "recv"; got ${JSON.stringify(dir)}`);
}

function normalizeInstr(value: unknown, index: number, scope: FunctionScope, label: string): IrInstr {
  const obj = expectPlainObject(value, label);
  const op = expectString(obj.op, `${label}.op`);

  const keys = (...allowed: string[]): void => {
    const withDst = RESULTLESS_OPS.has(op) ? ["op"] : ["op", "dst", "type"];
    assertNoExtraKeys(obj, [...withDst, ...allowed], label);
  };
  const dst = (): IrRegister => {
    const name = expectNonEmptyString(obj.dst, `${label}.dst`);
    const reg = scope.registers.get(name);
    if (!reg || reg.origin !== "instr") throw new Error(`${label}.dst is not an instruction register: ${name}`);
    return reg;
  };
  const val = (key: string): IrValue => normalizeValue(obj[key], scope, `${label}.${key}`);
  const vals = (key: string): IrValue[] =>
    expectOptionalArray(obj[key], `${label}.${key}`).map((v, i) => normalizeValue(v, scope, `${label}.${key}[${i}]`));
  const flag = (key: string): boolean => expectOptionalBoolean(obj[key], `${label}.${key}`);
  const int = (key: string): number => expectNonNegativeSafeInt(obj[key], `${label}.${key}`);

  switch (op) {
    case "alloc":
    case "make_map":
    case "make_slice":
    case "make_chan":
      keys("args");
      vals("args");
      return { kind: op, index, dst: dst() };
    case "load":
      keys("x");
      return { kind: "load", index, dst: dst(), x: val("x") };
    case "store":
      keys("addr", "value");
      return { kind: "store", index, addr: val("addr"), value: val("value") };
    case "recv":
      keys("chan", "commaOk");
      return { kind: "recv", index, dst: dst(), chan: val("chan"), commaOk: flag("commaOk") };
    case "unop":
    case "convert":
    case "slice":
      keys("x", "operator");
      return { kind: op, index, dst: dst(), x: val("x") };
    case "binop":
      keys("x", "y", "operator");
      return { kind: "binop", index, dst: dst(), x: val("x"), y: val("y") };
    case "change_type":
    case "change_interface":
    case "make_interface":
      keys("x");
      return { kind: op, index, dst: dst(), x: val("x") };
    case "make_closure": {
      keys("fn", "bindings");
      const fn = createFuncId(expectNonEmptyString(obj.fn, `${label}.fn`));
      if (!scope.signatures.has(fn)) throw new Error(`${label}.fn references unknown function ${JSON.stringify(fn)}`);
      return { kind: "make_closure", index, dst: dst(), fn, bindings: vals("bindings") };
    }
    case "phi":
      keys("edges");
      return { kind: "phi", index, dst: dst(), edges: vals("edges") };
    case "type_assert": {
      keys("x", "assertedType", "commaOk");
      const assertedType = parseTypeAt(obj.assertedType, `${label}.assertedType`);
      assertKnownTypes(assertedType, scope.table, `${label}.assertedType`);
      return { kind: "type_assert", index, dst: dst(), x: val("x"), assertedType, commaOk: flag("commaOk") };
    }
    case "extract":
      keys("tuple", "tupleIndex");
      return { kind: "extract", index, dst: dst(), tuple: val("tuple"), tupleIndex: int("tupleIndex") };
    case "field":
    case "field_addr":
      keys("x", "field");
      return { kind: op, index, dst: dst(), x: val("x"), field: int("field") };
    case "index":
    case "index_addr":
      keys("x", "at");
      return { kind: op, index, dst: dst(), x: val("x"), at: val("at") };
    case "lookup":
      keys("x", "key", "commaOk");
      return { kind: "lookup", index, dst: dst(), x: val("x"), key: val("key"), commaOk: flag("commaOk") };
    case "map_update":
      keys("map", "key", "value");
      return { kind: "map_update", index, map: val("map"), key: val("key"), value: val("value") };
    case "next":
      keys("iter", "isString");
      return { kind: "next", index, dst: dst(), iter: val("iter"), isString: flag("isString") };
    case "send":
      keys("chan", "x");
      return { kind: "send", index, chan: val("chan"), x: val("x") };
    case "select": {
      keys("states");
      const states = expectArray(obj.states, `${label}.states`).map((s, i) =>
        normalizeSelectState(s, scope, `${label}.states[${i}]`),
      );
      return { kind: "select", index, dst: dst(), states };
    }
    case "call":
    case "go":
    case "defer": {
      keys("value", "invoke", "builtin", "args");
      const target = normalizeCallTarget(obj, scope, label);
      const hasDst = op === "call" && obj.dst !== undefined;
      if (op === "call" && obj.dst === undefined && obj.type !== undefined) {
        throw new Error(`${label}.type requires a dst`);
      }
      return { kind: "call", index, mode: op, dst: hasDst ? dst() : null, target, args: vals("args") };
    }
    case "panic":
      keys("x");
      return { kind: "panic", index, x: val("x") };
    case "return":
      keys("results");
      return { kind: "return", index, results: vals("results") };
    case "jump":
      keys();
      return { kind: "jump", index };
    case "if":
      keys("cond");
      return { kind: "if", index, cond: val("cond") };
    default:
      throw new Error(`${label}.op is not a supported instruction: ${JSON.stringify(op)}`);
  }
}

function collectRegisters(fn: RawFunction, table: TypeTable): Map<string, IrRegister> {
  const registers = new Map<string, IrRegister>();
  const declare = (name: string, type: IrType, origin: IrRegisterOrigin, label: string): void => {
    if (registers.has(name)) throw new Error(`${label} redeclares register ${JSON.stringify(name)}`);
    assertKnownTypes(type, table, label);
    registers.set(name, { kind: "reg", func: fn.id, name, type, origin });
  };

  if (fn.recv) declare(fn.recv.name, fn.recv.type, "param", `${fn.label}.recv`);
  fn.params.forEach((p, i) => declare(p.name, p.type, "param", `${fn.label}.params[${i}]`));
  fn.freeVars.forEach((p, i) => declare(p.name, p.type, "free_var", `${fn.label}.freeVars[${i}]`));

  for (let i = 0; i < fn.instrs.length; i++) {
    const il = `${fn.label}.instrs[${i}]`;
    const obj = expectPlainObject(fn.instrs[i], il);
    const op = expectString(obj.op, `${il}.op`);
    if (obj.dst === undefined) {
      if (obj.type !== undefined && !RESULTLESS_OPS.has(op)) throw new Error(`${il}.type requires a dst`);
      continue;
    }
    if (RESULTLESS_OPS.has(op)) throw new Error(`${il}.dst is not allowed for ${JSON.stringify(op)}`);
    const name = expectNonEmptyString(obj.dst, `${il}.dst`);
    declare(name, parseTypeAt(obj.type, `${il}.type`), "instr", il);
  }

  return registers;
}

export function normalizeProgram(value: unknown): IrProgram {
  const obj = expectPlainObject(value, "Program");
  assertNoExtraKeys(obj, ["schemaVersion", "types", "globals", "functions"], "Program");

  if (obj.schemaVersion !== PROGRAM_SCHEMA_VERSION) {
    throw new Error(
      `Program.schemaVersion must be ${PROGRAM_SCHEMA_VERSION}; got ${JSON.stringify(obj.schemaVersion)}`,
    );
  }

  // Named types: names first so that underlying types and methods may refer to each other.
  const rawTypes = expectOptionalArray(obj.types, "Program.types").map((t, i) =>
    normalizeNamedTypeRaw(t, `Program.types[${i}]`),
  );
  const rawByName = new Map<string, RawNamedType>();
  for (const t of rawTypes) {
    if (t.name === ERROR_TYPE_NAME) throw new Error(`${t.label}.name must not redeclare the predeclared error type`);
    if (rawByName.has(t.name)) throw new Error(`Program.types contains duplicate type ${JSON.stringify(t.name)}`);
    rawByName.set(t.name, t);
  }
  const knownNames = new Set<string>([...rawByName.keys(), ERROR_TYPE_NAME]);
  const knownNamesMap = new Map<string, true>([...knownNames].map((n) => [n, true]));
  for (const t of rawTypes) assertKnownTypes(t.underlying, knownNamesMap, `${t.label}.underlying`);

  // Functions (signatures only) so that methods and operands can be resolved.
  const rawFunctions = expectArray(obj.functions, "Program.functions").map((f, i) =>
    normalizeFunctionRaw(f, `Program.functions[${i}]`),
  );
  const rawFnById = new Map<FuncId, RawFunction>();
  for (const f of rawFunctions) {
    if (rawFnById.has(f.id)) throw new Error(`Program.functions contains duplicate function ${JSON.stringify(f.id)}`);
    rawFnById.set(f.id, f);
  }
  const signatures = new Map<FuncId, SignatureType>();
  for (const f of rawFunctions) {
    signatures.set(f.id, {
      kind: "signature",
      params: f.params.map((p) => p.type),
      results: f.results,
      variadic: f.variadic,
    });
  }

  const table = new Map<string, NamedTypeDecl>();
  table.set(ERROR_TYPE_NAME, {
    name: ERROR_TYPE_NAME,
    underlying: { kind: "interface", methods: [{ name: "Error", signature: ERROR_METHOD_SIGNATURE }] },
    methods: new Map(),
  });
  for (const t of rawTypes) {
    const methods = new Map<string, MethodEntry>();
    for (const m of t.methods) {
      const fn = rawFnById.get(m.func);
      if (!fn) throw new Error(`${m.label}.func references unknown function ${JSON.stringify(m.func)}`);
      if (!fn.recv) throw new Error(`${m.label}.func must be a method (function with a receiver): ${m.func}`);
      const recvType = fn.recv.type;
      const isPtr = recvType.kind === "pointer";
      const base = isPtr ? recvType.elem : recvType;
      if (base.kind !== "named" || base.name !== t.name) {
        throw new Error(`${m.label}.func receiver type ${typeString(recvType)} does not belong to ${t.name}`);
      }
      if (m.pointerReceiver !== null && m.pointerReceiver !== isPtr) {
        throw new Error(`${m.label}.pointerReceiver does not match receiver type ${typeString(recvType)}`);
      }
      const signature = signatures.get(fn.id);
      if (!signature) throw new Error(`Missing signature for ${fn.id}`);
      methods.set(m.name, { name: m.name, func: fn.id, pointerReceiver: isPtr, signature });
    }
    table.set(t.name, { name: t.name, underlying: resolveUnderlying(t.name, rawByName), methods });
  }

  // Methods belong to concrete named types only.
  for (const decl of table.values()) {
    if (decl.underlying.kind !== "interface") continue;
    if (decl.methods.size > 0) throw new Error(`Interface type ${decl.name} must not declare methods`);
  }

  const globals = new Map<string, IrGlobal>();
  const rawGlobals = expectOptionalArray(obj.globals, "Program.globals");
  for (let i = 0; i < rawGlobals.length; i++) {
    const gl = `Program.globals[${i}]`;
    const g = expectPlainObject(rawGlobals[i], gl);
    assertNoExtraKeys(g, ["name", "type"], gl);
    const name = expectNonEmptyString(g.name, `${gl}.name`);
    if (globals.has(name)) throw new Error(`Program.globals contains duplicate global ${JSON.stringify(name)}`);
    const type = parseTypeAt(g.type, `${gl}.type`);
    assertKnownTypes(type, table, `${gl}.type`);
    globals.set(name, { name, type });
  }

  const functions: IrFunction[] = [];
  for (const f of rawFunctions) {
    for (const r of f.results) assertKnownTypes(r, table, `${f.label}.results`);
    const registers = collectRegisters(f, table);
    const scope: FunctionScope = { funcId: f.id, registers, globals, signatures, table };

    const instrs: IrInstr[] = [];
    for (let i = 0; i < f.instrs.length; i++) {
      instrs.push(normalizeInstr(f.instrs[i], i, scope, `${f.label}.instrs[${i}]`));
    }

    const closureFns = new Map<string, FuncId>();
    for (const instr of instrs) {
      if (instr.kind !== "make_closure") continue;
      const callee = rawFnById.get(instr.fn);
      if (callee && callee.freeVars.length !== instr.bindings.length) {
        throw new Error(
          `${f.label}.instrs[${instr.index}].bindings has ${instr.bindings.length} entries; ${instr.fn} has ${callee.freeVars.length} free variables`,
        );
      }
      closureFns.set(instr.dst.name, instr.fn);
    }

    const signature = signatures.get(f.id);
    if (!signature) throw new Error(`Missing signature for ${f.id}`);
    const params: IrRegister[] = [];
    if (f.recv) params.push(lookupRegister(registers, f.recv.name));
    for (const p of f.params) params.push(lookupRegister(registers, p.name));

    functions.push({
      id: f.id,
      hasReceiver: f.recv !== null,
      params,
      freeVars: f.freeVars.map((p) => lookupRegister(registers, p.name)),
      signature,
      instrs,
      closureFns,
      external: instrs.length === 0,
    });
  }

  const sorted = stableSort(functions, (a, b) => cmpFuncId(a.id, b.id));
  const functionById = new Map<FuncId, IrFunction>();
  for (const fn of sorted) functionById.set(fn.id, fn);

  return {
    schemaVersion: PROGRAM_SCHEMA_VERSION,
    types: table,
    globals,
    functions: sorted,
    functionById,
  };
}

function lookupRegister(registers: ReadonlyMap<string, IrRegister>, name: string): IrRegister {
  const reg = registers.get(name);
  if (!reg) throw new Error(`Missing register ${JSON.stringify(name)}`);
  return reg;
}

export function loadProgramFromFile(filePath: string): IrProgram {
  const raw = readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse program JSON: file=${JSON.stringify(filePath)} error=${msg}`);
  }
  try {
    return normalizeProgram(parsed);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid program: file=${JSON.stringify(filePath)} error=${msg}`);
  }
}

export function requireFunction(program: IrProgram, id: FuncId): IrFunction {
  const fn = program.functionById.get(id);
  if (!fn) throw new Error(`Unknown function: ${id}`);
  return fn;
}

// The callee known without any type information: a function constant, or a closure built in the same body.
export function staticCallee(fn: IrFunction, target: IrCallTarget): FuncId | null {
  if (target.kind !== "value") return null;
  const v = target.value;
  if (v.kind === "func") return v.id;
  if (v.kind === "reg" && v.origin === "instr") return fn.closureFns.get(v.name) ?? null;
  return null;
}

export function instrLocation(fn: IrFunction, instr: IrInstr): string {
  return `${fn.id}#${instr.index} (${instr.kind})`;
}
