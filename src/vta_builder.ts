import { calleesAtSite } from "./call_graph.ts";
import type { CallGraph } from "./call_graph.ts";
import { cmpFuncId, createCallsiteId } from "./ids.ts";
import type { CallsiteId, FuncId } from "./ids.ts";
import { instrLocation, staticCallee } from "./ir.ts";
import type { IrCallInstr, IrFunction, IrInstr, IrProgram, IrRegister, IrValue } from "./ir.ts";
import { stableSort } from "./determinism.ts";
import {
  canHaveMethods,
  functionUnderPtr,
  interfaceUnderPtr,
  isFunctionType,
  isInterfaceType,
  isStringType,
  sliceArrayElem,
  typeString,
  underlying,
} from "./types.ts";
import type { IrType } from "./types.ts";
import {
  PANIC_ARG_NODE,
  RECOVER_RETURN_NODE,
  channelElemNode,
  constantNode,
  fieldNode,
  functionNode,
  globalNode,
  indexedLocalNode,
  localNode,
  mapKeyNode,
  mapValueNode,
  nestedPtrFunctionNode,
  nestedPtrInterfaceNode,
  nodeType,
  pointerNode,
  resultNode,
  sliceElemNode,
} from "./vta_node.ts";
import type { VtaNode } from "./vta_node.ts";
import { createVtaGraph } from "./vta_graph.ts";
import type { VtaGraph } from "./vta_graph.ts";

export type DynamicCallKind = "invoke" | "func_value";

// A call whose callee depends on the runtime type of `operand`.
export type DynamicCallSite = Readonly<{
  site: CallsiteId;
  caller: FuncId;
  kind: DynamicCallKind;
  operand: VtaNode;
  // Set for "invoke" only.
  method: string | null;
}>;

export type StaticCallSite = Readonly<{
  site: CallsiteId;
  caller: FuncId;
  callee: FuncId;
}>;

export type VtaBuildResult = Readonly<{
  graph: VtaGraph;
  // Function order, then instruction order.
  dynamicSites: readonly DynamicCallSite[];
  staticSites: readonly StaticCallSite[];
}>;

// Whether concrete types may flow into `n`: sentinels, and interface or function typed nodes
// (possibly behind pointers).
export function hasInFlow(n: VtaNode, program: IrProgram): boolean {
  const t = nodeType(n);
  if (t === null) return true;
  const table = program.types;
  if (interfaceUnderPtr(t, table) !== null || functionUnderPtr(t, table) !== null) return true;
  return isInterfaceType(t, table) || isFunctionType(t, table);
}

export function isReferenceNode(n: VtaNode, program: IrProgram): boolean {
  if (n.kind === "nested_ptr_interface" || n.kind === "nested_ptr_function" || n.kind === "global") return true;
  const t = nodeType(n);
  return t !== null && underlying(t, program.types).kind === "pointer";
}

export function nodeFromValue(v: IrValue, program: IrProgram): VtaNode {
  const table = program.types;
  const u = underlying(v.type, table);
  if (u.kind === "pointer" && !isInterfaceType(u.elem, table) && !isFunctionType(u.elem, table)) {
    const iface = interfaceUnderPtr(u.elem, table);
    if (iface) return nestedPtrInterfaceNode(iface);
    const fn = functionUnderPtr(u.elem, table);
    if (fn) return nestedPtrFunctionNode(fn);
    return pointerNode(v.type);
  }

  switch (v.kind) {
    case "const":
      return constantNode(v.type);
    case "global": {
      const g = program.globals.get(v.name);
      if (!g) throw new Error(`Unknown global: ${v.name}`);
      return globalNode(v.name, g.type);
    }
    case "func":
      return functionNode(v.id, v.type);
    case "reg":
      return localNode(v.func, v.name, v.type);
  }
}

export function buildTypePropGraph(program: IrProgram, baseline: CallGraph): VtaBuildResult {
  const graph = createVtaGraph();
  const table = program.types;
  const dynamicSites: DynamicCallSite[] = [];
  const staticSites: StaticCallSite[] = [];

  const node = (v: IrValue): VtaNode => nodeFromValue(v, program);

  const addInFlowEdge = (s: VtaNode, d: VtaNode): void => {
    if (hasInFlow(d, program)) graph.addEdge(s, d);
  };

  const addInFlowAliasEdges = (l: VtaNode, r: VtaNode): void => {
    addInFlowEdge(r, l);
    if (isReferenceNode(l, program) && isReferenceNode(r, program)) addInFlowEdge(l, r);
  };

  // Storage slots shared by every access: flow in both directions.
  const addSlotEdges = (slot: VtaNode, v: VtaNode): void => {
    addInFlowEdge(slot, v);
    addInFlowEdge(v, slot);
  };

  const malformed = (fn: IrFunction, instr: IrInstr, msg: string): never => {
    throw new Error(`${instrLocation(fn, instr)}: ${msg}`);
  };

  const chanElem = (fn: IrFunction, instr: IrInstr, chan: IrValue): IrType => {
    const u = underlying(chan.type, table);
    if (u.kind !== "chan") return malformed(fn, instr, `expected a channel operand; got ${typeString(chan.type)}`);
    return u.elem;
  };

  const tupleElem = (fn: IrFunction, instr: IrInstr, reg: IrRegister, index: number): IrType => {
    const t = reg.type;
    if (t.kind !== "tuple") return malformed(fn, instr, `expected a tuple result; got ${typeString(t)}`);
    const e = t.elems[index];
    if (!e) return malformed(fn, instr, `tuple ${typeString(t)} has no component ${index}`);
    return e;
  };

  const indexed = (reg: IrRegister, type: IrType, index: number): VtaNode =>
    indexedLocalNode(reg.func, reg.name, type, index);

  const structField = (fn: IrFunction, instr: IrInstr, structType: IrType, index: number): VtaNode => {
    const u = underlying(structType, table);
    if (u.kind !== "struct") return malformed(fn, instr, `expected a struct operand; got ${typeString(structType)}`);
    const f = u.fields[index];
    if (!f) return malformed(fn, instr, `struct ${typeString(structType)} has no field ${index}`);
    return fieldNode(structType, index, f.name, f.type);
  };

  const call = (fn: IrFunction, instr: IrCallInstr): void => {
    const target = instr.target;
    if (target.kind === "builtin") {
      if (target.name === "recover" && instr.dst) addInFlowEdge(RECOVER_RETURN_NODE, node(instr.dst));
      return;
    }

    const site = createCallsiteId(fn.id, instr.index);
    const known = staticCallee(fn, target);
    if (known) staticSites.push({ site, caller: fn.id, callee: known });
    else if (target.kind === "invoke") {
      dynamicSites.push({ site, caller: fn.id, kind: "invoke", operand: node(target.receiver), method: target.method });
    } else {
      dynamicSites.push({ site, caller: fn.id, kind: "func_value", operand: node(target.value), method: null });
    }

    const callees = new Set<FuncId>(calleesAtSite(baseline, site));
    if (known) callees.add(known);

    for (const calleeId of stableSort(Array.from(callees), cmpFuncId)) {
      const callee = program.functionById.get(calleeId);
      if (!callee) return malformed(fn, instr, `call graph names unknown callee ${calleeId}`);

      // No body: its parameters flow nowhere.
      if (!callee.external) {
        let offset = 0;
        if (target.kind === "invoke") {
          offset = 1;
          // Receivers do not flow into concrete callees, except named function types.
          const recvParam = callee.params[0];
          if (recvParam && isFunctionType(recvParam.type, table)) {
            addInFlowEdge(node(target.receiver), node(recvParam));
          }
        }
        for (let i = 0; i < instr.args.length; i++) {
          const param = callee.params[i + offset];
          const arg = instr.args[i];
          if (!param || !arg) break;
          // Pointer arguments are shared storage: callee writes flow back to the caller.
          addInFlowAliasEdges(node(param), node(arg));
        }
      }

      const dst = instr.dst;
      if (!dst) continue;
      const results = callee.signature.results;
      if (results.length === 1) {
        const r = results[0];
        if (r) addInFlowEdge(resultNode(callee.id, 0, r), node(dst));
        continue;
      }
      for (let i = 0; i < results.length; i++) {
        const r = results[i];
        if (!r) continue;
        addInFlowEdge(resultNode(callee.id, i, r), indexed(dst, tupleElem(fn, instr, dst, i), i));
      }
    }
  };

  const visit = (fn: IrFunction, instr: IrInstr): void => {
    switch (instr.kind) {
      case "store":
        addInFlowAliasEdges(node(instr.addr), node(instr.value));
        return;
      case "load":
        addInFlowAliasEdges(node(instr.dst), node(instr.x));
        return;
      case "change_type":
        addInFlowAliasEdges(node(instr.dst), node(instr.x));
        return;
      case "make_interface":
      case "change_interface":
        addInFlowEdge(node(instr.x), node(instr.dst));
        return;
      case "phi":
        for (const e of instr.edges) addInFlowAliasEdges(node(instr.dst), node(e));
        return;
      case "type_assert":
        if (instr.commaOk) addInFlowEdge(node(instr.x), indexed(instr.dst, instr.assertedType, 0));
        else addInFlowEdge(node(instr.x), node(instr.dst));
        return;
      case "extract": {
        const tuple = instr.tuple;
        if (tuple.kind !== "reg") return malformed(fn, instr, "extract operand must be a register");
        const t = tupleElem(fn, instr, tuple, instr.tupleIndex);
        addInFlowAliasEdges(node(instr.dst), indexed(tuple, t, instr.tupleIndex));
        return;
      }
      case "field":
        addSlotEdges(structField(fn, instr, instr.x.type, instr.field), node(instr.dst));
        return;
      case "field_addr": {
        const u = underlying(instr.x.type, table);
        if (u.kind !== "pointer") {
          return malformed(fn, instr, `expected a pointer to struct; got ${typeString(instr.x.type)}`);
        }
        addSlotEdges(structField(fn, instr, u.elem, instr.field), node(instr.dst));
        return;
      }
      case "index":
      case "index_addr": {
        const elem = sliceArrayElem(instr.x.type, table);
        if (elem === null) {
          if (isStringType(instr.x.type, table)) return;
          return malformed(fn, instr, `expected a slice, array or string operand; got ${typeString(instr.x.type)}`);
        }
        addSlotEdges(sliceElemNode(elem), node(instr.dst));
        return;
      }
      case "lookup": {
        const u = underlying(instr.x.type, table);
        if (u.kind !== "map") {
          if (isStringType(instr.x.type, table)) return;
          return malformed(fn, instr, `expected a map or string operand; got ${typeString(instr.x.type)}`);
        }
        const dst = instr.commaOk ? indexed(instr.dst, u.elem, 0) : node(instr.dst);
        addSlotEdges(mapValueNode(u.elem), dst);
        return;
      }
      case "map_update": {
        const u = underlying(instr.map.type, table);
        if (u.kind !== "map") return malformed(fn, instr, `expected a map operand; got ${typeString(instr.map.type)}`);
        addSlotEdges(mapKeyNode(u.key), node(instr.key));
        addSlotEdges(mapValueNode(u.elem), node(instr.value));
        return;
      }
      case "next": {
        if (instr.isString) return;
        const kt = tupleElem(fn, instr, instr.dst, 1);
        const vt = tupleElem(fn, instr, instr.dst, 2);
        addSlotEdges(mapKeyNode(kt), indexed(instr.dst, kt, 1));
        addSlotEdges(mapValueNode(vt), indexed(instr.dst, vt, 2));
        return;
      }
      case "send":
        addSlotEdges(channelElemNode(chanElem(fn, instr, instr.chan)), node(instr.x));
        return;
      case "recv": {
        const elem = chanElem(fn, instr, instr.chan);
        const dst = instr.commaOk ? indexed(instr.dst, elem, 0) : node(instr.dst);
        addSlotEdges(channelElemNode(elem), dst);
        return;
      }
      case "select": {
        let recvIndex = 0;
        for (const state of instr.states) {
          const elem = chanElem(fn, instr, state.chan);
          if (state.dir === "send") {
            addSlotEdges(channelElemNode(elem), node(state.send));
          } else {
            // Result tuple: (index, recvOk, r_0, ..., r_n-1).
            addSlotEdges(channelElemNode(elem), indexed(instr.dst, elem, 2 + recvIndex));
            recvIndex++;
          }
        }
        return;
      }
      case "make_closure": {
        const closure = program.functionById.get(instr.fn);
        if (!closure) return malformed(fn, instr, `unknown closure function ${instr.fn}`);
        addInFlowEdge(functionNode(closure.id, closure.signature), node(instr.dst));
        for (let i = 0; i < closure.freeVars.length; i++) {
          const fv = closure.freeVars[i];
          const binding = instr.bindings[i];
          if (!fv || !binding) break;
          addInFlowAliasEdges(node(fv), node(binding));
        }
        return;
      }
      case "return":
        for (let i = 0; i < instr.results.length; i++) {
          const r = instr.results[i];
          const declared = fn.signature.results[i];
          if (!r) continue;
          if (!declared) return malformed(fn, instr, `returns ${instr.results.length} values; declared ${fn.signature.results.length}`);
          addInFlowEdge(node(r), resultNode(fn.id, i, declared));
        }
        return;
      case "panic":
        if (canHaveMethods(instr.x.type, table)) addInFlowEdge(node(instr.x), PANIC_ARG_NODE);
        return;
      case "call":
        call(fn, instr);
        return;
      case "alloc":
      case "make_map":
      case "make_slice":
      case "make_chan":
      case "unop":
      case "binop":
      case "convert":
      case "slice":
      case "jump":
      case "if":
        return;
    }
  };

  // Any panic value may be recovered anywhere.
  addInFlowEdge(PANIC_ARG_NODE, RECOVER_RETURN_NODE);

  for (const fn of program.functions) {
    for (const instr of fn.instrs) visit(fn, instr);
  }

  return { graph, dynamicSites, staticSites };
}
