import { cmpString, stableSort } from "./determinism.ts";
import { runRoundFixpoint } from "./fixpoint.ts";
import type { FuncId } from "./ids.ts";
import { asInterface, implementsInterface, typeKey, typeString } from "./types.ts";
import type { InterfaceType, IrType, TypeTable } from "./types.ts";
import { isNestedPtrNode, isSentinelNode, nodeKey, nodeType } from "./vta_node.ts";
import type { NodeKey, VtaNode } from "./vta_node.ts";
import type { VtaGraphView } from "./vta_graph.ts";

// A concrete type reaching a node. `func` is set when the type denotes a specific function value.
export type PropType = Readonly<{
  type: IrType;
  func: FuncId | null;
}>;

export type PropagationView = Readonly<{
  // Stable-sorted by type, then function.
  typesOf: (n: VtaNode) => readonly PropType[];
}>;

export type PropagationOptions = Readonly<{
  // Defaults to nodeCount * (seedUniverse + 1) + 1, which no monotone run can exceed.
  maxRounds?: number;
  observe?: (round: number, view: PropagationView) => void;
}>;

export type PropagationResult = PropagationView &
  Readonly<{
    nodes: () => readonly VtaNode[];
    rounds: number;
    // Distinct seed types in the graph.
    typeUniverseSize: number;
  }>;

export function propTypeKey(p: PropType): string {
  return `${typeKey(p.type)}\0${p.func ?? ""}`;
}

export function cmpPropType(a: PropType, b: PropType): number {
  return cmpString(typeString(a.type), typeString(b.type)) || cmpString(a.func ?? "", b.func ?? "");
}

// Interface-typed nodes start empty; so do the sentinels and nested-pointer nodes.
export function hasInitialTypes(n: VtaNode, table: TypeTable): boolean {
  if (isSentinelNode(n) || isNestedPtrNode(n)) return false;
  const t = nodeType(n);
  return t !== null && asInterface(t, table) === null;
}

export function seedOf(n: VtaNode, table: TypeTable): PropType | null {
  if (!hasInitialTypes(n, table)) return null;
  const t = nodeType(n);
  if (t === null) return null;
  return { type: t, func: n.kind === "function" ? n.func : null };
}

export function propagateTypes(
  graph: VtaGraphView,
  table: TypeTable,
  options: PropagationOptions = {},
): PropagationResult {
  const sets = new Map<NodeKey, Map<string, PropType>>();
  const universe = new Set<string>();

  const setFor = (n: VtaNode): Map<string, PropType> => {
    const k = nodeKey(n);
    const existing = sets.get(k);
    if (existing) return existing;
    const created = new Map<string, PropType>();
    sets.set(k, created);
    return created;
  };

  const allNodes = graph.nodes();
  for (const n of allNodes) {
    const s = setFor(n);
    const seed = seedOf(n, table);
    if (!seed) continue;
    const k = propTypeKey(seed);
    s.set(k, seed);
    universe.add(k);
  }

  const maxRounds = options.maxRounds ?? allNodes.length * (universe.size + 1) + 1;

  const implementsCache = new Map<string, boolean>();
  const admits = (iface: InterfaceType, p: PropType): boolean => {
    const k = `${typeKey(iface)}\0${typeKey(p.type)}`;
    const cached = implementsCache.get(k);
    if (cached !== undefined) return cached;
    const ok = implementsInterface(p.type, iface, table);
    implementsCache.set(k, ok);
    return ok;
  };

  const filterOf = (n: VtaNode): InterfaceType | null => {
    const t = nodeType(n);
    return t === null ? null : asInterface(t, table);
  };

  const typesOf = (n: VtaNode): readonly PropType[] => {
    const s = sets.get(nodeKey(n));
    if (!s) {
      const seed = seedOf(n, table);
      return seed ? [seed] : [];
    }
    return stableSort(Array.from(s.values()), cmpPropType);
  };
  const view: PropagationView = { typesOf };

  const { rounds } = runRoundFixpoint<VtaNode>({
    initial: allNodes,
    key: nodeKey,
    maxRounds,
    step: (n) => {
      const src = setFor(n);
      if (src.size === 0) return [];
      const changed: VtaNode[] = [];
      for (const succ of graph.successors(n)) {
        const dst = setFor(succ);
        const iface = filterOf(succ);
        let grew = false;
        for (const [k, p] of src) {
          if (dst.has(k)) continue;
          if (iface && !admits(iface, p)) continue;
          dst.set(k, p);
          grew = true;
        }
        if (grew) changed.push(succ);
      }
      return changed;
    },
    onRound: options.observe ? (round) => options.observe?.(round, view) : undefined,
  });

  return {
    typesOf,
    nodes: () => allNodes,
    rounds,
    typeUniverseSize: universe.size,
  };
}
