import { normalizeCallGraph } from "./call_graph.ts";
import type { CallEdge, CallGraph } from "./call_graph.ts";
import { cmpString, stableSort } from "./determinism.ts";
import { cmpFuncId, createCallsiteId } from "./ids.ts";
import type { FuncId } from "./ids.ts";
import { staticCallee } from "./ir.ts";
import type { IrCallTarget, IrFunction, IrProgram } from "./ir.ts";
import { asInterface, asSignature, identicalTypes, implementsInterface, lookupMethod, typeKey } from "./types.ts";
import type { InterfaceType, IrType } from "./types.ts";

type CalleeFinder = (fn: IrFunction, target: IrCallTarget) => readonly FuncId[];

function buildCallGraph(program: IrProgram, find: CalleeFinder): CallGraph {
  const edges: CallEdge[] = [];
  for (const fn of program.functions) {
    for (const instr of fn.instrs) {
      if (instr.kind !== "call") continue;
      const site = createCallsiteId(fn.id, instr.index);
      for (const callee of find(fn, instr.target)) edges.push({ caller: fn.id, site, callee });
    }
  }
  return normalizeCallGraph({ nodes: program.functions.map((f) => f.id), edges });
}

// Only statically known callees: direct calls of functions and of closures built in the same body.
export function staticCallGraph(program: IrProgram): CallGraph {
  return buildCallGraph(program, (fn, target) => {
    const callee = staticCallee(fn, target);
    return callee ? [callee] : [];
  });
}

// Concrete types that may implement an interface: every declared non-interface named type T and *T.
function concreteCandidates(program: IrProgram): IrType[] {
  const out: IrType[] = [];
  const names = stableSort(Array.from(program.types.keys()), cmpString);
  for (const name of names) {
    const decl = program.types.get(name);
    if (!decl || decl.underlying.kind === "interface") continue;
    const t: IrType = { kind: "named", name };
    out.push(t, { kind: "pointer", elem: t });
  }
  return out;
}

// Class hierarchy analysis: dynamic calls go to every function whose type fits the call.
export function chaCallGraph(program: IrProgram): CallGraph {
  const candidates = concreteCandidates(program);
  const invokeCache = new Map<string, readonly FuncId[]>();
  const valueCache = new Map<string, readonly FuncId[]>();

  const implementersOf = (iface: InterfaceType, method: string): readonly FuncId[] => {
    const key = `${typeKey(iface)}\0${method}`;
    const cached = invokeCache.get(key);
    if (cached) return cached;
    const found = new Set<FuncId>();
    for (const t of candidates) {
      if (!implementsInterface(t, iface, program.types)) continue;
      const m = lookupMethod(t, method, program.types);
      if (m) found.add(m.func);
    }
    const out = stableSort(Array.from(found), cmpFuncId);
    invokeCache.set(key, out);
    return out;
  };

  const functionsOfType = (t: IrType): readonly FuncId[] => {
    const sig = asSignature(t, program.types);
    if (!sig) return [];
    const key = typeKey(sig);
    const cached = valueCache.get(key);
    if (cached) return cached;
    const out = program.functions
      .filter((f) => !f.hasReceiver && identicalTypes(f.signature, sig))
      .map((f) => f.id);
    valueCache.set(key, out);
    return out;
  };

  return buildCallGraph(program, (fn, target) => {
    const callee = staticCallee(fn, target);
    if (callee) return [callee];

    switch (target.kind) {
      case "builtin":
        return [];
      case "value":
        return functionsOfType(target.value.type);
      case "invoke": {
        const recvType = target.receiver.type;
        const iface = asInterface(recvType, program.types);
        if (iface) return implementersOf(iface, target.method);
        const m = lookupMethod(recvType, target.method, program.types);
        return m ? [m.func] : [];
      }
    }
  });
}
