import type { FuncId } from "./ids.ts";
import { typeKey, typeString } from "./types.ts";
import type { IrType, SignatureType } from "./types.ts";

// Nodes of the type-propagation graph. Identity is the kind plus the identity fields (see nodeKey);
// display-only fields (fieldName, fieldType, the type of a local) never take part in it.
export type VtaNode =
  | Readonly<{ kind: "constant"; type: IrType }>
  | Readonly<{ kind: "pointer"; type: IrType }>
  | Readonly<{ kind: "map_key"; type: IrType }>
  | Readonly<{ kind: "map_value"; type: IrType }>
  // Element type of the slice or array.
  | Readonly<{ kind: "slice_elem"; type: IrType }>
  // Element type of the channel.
  | Readonly<{ kind: "channel_elem"; type: IrType }>
  | Readonly<{ kind: "field"; structType: IrType; index: number; fieldName: string; fieldType: IrType }>
  | Readonly<{ kind: "global"; name: string; type: IrType }>
  | Readonly<{ kind: "local"; func: FuncId; name: string; type: IrType }>
  | Readonly<{ kind: "indexed_local"; func: FuncId; name: string; type: IrType; index: number }>
  | Readonly<{ kind: "function"; func: FuncId; type: SignatureType }>
  | Readonly<{ kind: "result"; func: FuncId; index: number; type: IrType }>
  | Readonly<{ kind: "nested_ptr_interface"; type: IrType }>
  | Readonly<{ kind: "nested_ptr_function"; type: IrType }>
  | Readonly<{ kind: "panic_arg" }>
  | Readonly<{ kind: "recover_return" }>;

export type NodeKey = string;

export const PANIC_ARG_NODE: VtaNode = { kind: "panic_arg" };
export const RECOVER_RETURN_NODE: VtaNode = { kind: "recover_return" };

export function constantNode(type: IrType): VtaNode {
  return { kind: "constant", type };
}

export function pointerNode(type: IrType): VtaNode {
  return { kind: "pointer", type };
}

export function mapKeyNode(type: IrType): VtaNode {
  return { kind: "map_key", type };
}

export function mapValueNode(type: IrType): VtaNode {
  return { kind: "map_value", type };
}

export function sliceElemNode(type: IrType): VtaNode {
  return { kind: "slice_elem", type };
}

export function channelElemNode(type: IrType): VtaNode {
  return { kind: "channel_elem", type };
}

export function fieldNode(structType: IrType, index: number, fieldName: string, fieldType: IrType): VtaNode {
  return { kind: "field", structType, index, fieldName, fieldType };
}

export function globalNode(name: string, type: IrType): VtaNode {
  return { kind: "global", name, type };
}

export function localNode(func: FuncId, name: string, type: IrType): VtaNode {
  return { kind: "local", func, name, type };
}

export function indexedLocalNode(func: FuncId, name: string, type: IrType, index: number): VtaNode {
  return { kind: "indexed_local", func, name, type, index };
}

export function functionNode(func: FuncId, type: SignatureType): VtaNode {
  return { kind: "function", func, type };
}

export function resultNode(func: FuncId, index: number, type: IrType): VtaNode {
  return { kind: "result", func, index, type };
}

export function nestedPtrInterfaceNode(type: IrType): VtaNode {
  return { kind: "nested_ptr_interface", type };
}

export function nestedPtrFunctionNode(type: IrType): VtaNode {
  return { kind: "nested_ptr_function", type };
}

export function nodeKey(n: VtaNode): NodeKey {
  switch (n.kind) {
    case "constant":
    case "pointer":
    case "map_key":
    case "map_value":
    case "slice_elem":
    case "channel_elem":
    case "nested_ptr_interface":
    case "nested_ptr_function":
      return JSON.stringify([n.kind, typeKey(n.type)]);
    case "field":
      return JSON.stringify([n.kind, typeKey(n.structType), n.index]);
    case "global":
      return JSON.stringify([n.kind, n.name]);
    case "local":
      return JSON.stringify([n.kind, n.func, n.name]);
    case "indexed_local":
      return JSON.stringify([n.kind, n.func, n.name, typeKey(n.type), n.index]);
    case "function":
      return JSON.stringify([n.kind, n.func]);
    case "result":
      return JSON.stringify([n.kind, n.func, n.index]);
    case "panic_arg":
    case "recover_return":
      return JSON.stringify([n.kind]);
  }
}

export function nodeString(n: VtaNode): string {
  switch (n.kind) {
    case "constant":
      return `Constant(${typeString(n.type)})`;
    case "pointer":
      return `Pointer(${typeString(n.type)})`;
    case "map_key":
      return `MapKey(${typeString(n.type)})`;
    case "map_value":
      return `MapValue(${typeString(n.type)})`;
    case "slice_elem":
      return `Slice([]${typeString(n.type)})`;
    case "channel_elem":
      return `Channel(chan ${typeString(n.type)})`;
    case "field":
      return `Field(${typeString(n.structType)}:${n.fieldName})`;
    case "global":
      return `Global(${n.name})`;
    case "local":
      return `Local(${n.name})`;
    case "indexed_local":
      return `Local(${n.name}[${n.index}])`;
    case "function":
      return `Function(${n.func})`;
    case "result":
      return `Return(${n.func}[${n.index}])`;
    case "nested_ptr_interface":
      return `PtrInterface(${typeString(n.type)})`;
    case "nested_ptr_function":
      return `PtrFunction(${typeString(n.type)})`;
    case "panic_arg":
      return "Panic";
    case "recover_return":
      return "Recover";
  }
}

// Static type of the node; the panic/recover sentinels have none.
export function nodeType(n: VtaNode): IrType | null {
  switch (n.kind) {
    case "constant":
    case "pointer":
    case "map_key":
    case "map_value":
    case "slice_elem":
    case "channel_elem":
    case "global":
    case "local":
    case "indexed_local":
    case "function":
    case "result":
    case "nested_ptr_interface":
    case "nested_ptr_function":
      return n.type;
    case "field":
      return n.fieldType;
    case "panic_arg":
    case "recover_return":
      return null;
  }
}

export function isSentinelNode(n: VtaNode): boolean {
  return n.kind === "panic_arg" || n.kind === "recover_return";
}

export function isNestedPtrNode(n: VtaNode): boolean {
  return n.kind === "nested_ptr_interface" || n.kind === "nested_ptr_function";
}
