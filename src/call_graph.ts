import { stableSort, uniqueSortedStrings } from "./determinism.ts";
import { callsiteIdToParts, cmpCallsiteId, cmpFuncId } from "./ids.ts";
import type { CallsiteId, FuncId } from "./ids.ts";

export type CallEdge = Readonly<{
  caller: FuncId;
  site: CallsiteId;
  callee: FuncId;
}>;

export type CallGraphInput = Readonly<{
  // Optional: include isolated functions not present in edges.
  nodes?: readonly FuncId[];
  edges: readonly CallEdge[];
}>;

export type CallGraph = Readonly<{
  // Canonical ordering is defined by normalizeCallGraph.
  nodes: readonly FuncId[];
  // Set semantics; sorted by caller, site, callee.
  edges: readonly CallEdge[];

  // Convenience indices.
  calleesBySite: ReadonlyMap<CallsiteId, readonly FuncId[]>;
  sitesByCaller: ReadonlyMap<FuncId, readonly CallsiteId[]>;

  // Caller/callee adjacency (unique, stable-sorted FuncIds).
  calleesByCaller: ReadonlyMap<FuncId, readonly FuncId[]>;
  callersByCallee: ReadonlyMap<FuncId, readonly FuncId[]>;
}>;

function edgeKey(e: CallEdge): string {
  // NUL-delimited so keys can't collide.
  return `${e.caller}\0${e.site}\0${e.callee}`;
}

export function cmpCallEdge(a: CallEdge, b: CallEdge): number {
  return cmpFuncId(a.caller, b.caller) || cmpCallsiteId(a.site, b.site) || cmpFuncId(a.callee, b.callee);
}

function assertSiteBelongsToCaller(e: CallEdge): void {
  const sp = callsiteIdToParts(e.site);
  if (sp.funcId !== e.caller) {
    throw new Error(`CallEdge.site must belong to caller; site=${e.site} caller=${e.caller}`);
  }
}

function pushTo<K, V>(m: Map<K, V[]>, k: K, v: V): void {
  const arr = m.get(k);
  if (arr) arr.push(v);
  else m.set(k, [v]);
}

function uniqueSortedFuncIds(values: Iterable<FuncId>): FuncId[] {
  return stableSort(Array.from(new Set(values)), cmpFuncId);
}

export function normalizeCallGraph(input: CallGraphInput): CallGraph {
  for (const e of input.edges) assertSiteBelongsToCaller(e);

  const nodeSet = new Set<FuncId>();
  if (input.nodes) for (const n of input.nodes) nodeSet.add(n);
  for (const e of input.edges) {
    nodeSet.add(e.caller);
    nodeSet.add(e.callee);
  }
  const nodes = stableSort(Array.from(nodeSet), cmpFuncId);

  // Canonicalize edge ordering and de-dupe deterministically.
  const sortedEdges = stableSort(input.edges, cmpCallEdge);
  const edges: CallEdge[] = [];
  const seenEdgeKeys = new Set<string>();
  for (const e of sortedEdges) {
    const k = edgeKey(e);
    if (seenEdgeKeys.has(k)) continue;
    seenEdgeKeys.add(k);
    edges.push(e);
  }

  // Edges are sorted by caller then site, so per-key arrays come out sorted as well.
  const calleesBySite = new Map<CallsiteId, FuncId[]>();
  const sitesByCallerRaw = new Map<FuncId, CallsiteId[]>();
  const calleesByCallerRaw = new Map<FuncId, FuncId[]>();
  const callersByCalleeRaw = new Map<FuncId, FuncId[]>();
  for (const e of edges) {
    const bySite = calleesBySite.get(e.site);
    if (bySite) bySite.push(e.callee);
    else {
      calleesBySite.set(e.site, [e.callee]);
      pushTo(sitesByCallerRaw, e.caller, e.site);
    }
    pushTo(calleesByCallerRaw, e.caller, e.callee);
    pushTo(callersByCalleeRaw, e.callee, e.caller);
  }

  const calleesByCaller = new Map<FuncId, FuncId[]>();
  for (const [caller, callees] of calleesByCallerRaw) calleesByCaller.set(caller, uniqueSortedFuncIds(callees));

  const callersByCallee = new Map<FuncId, FuncId[]>();
  for (const [callee, callers] of callersByCalleeRaw) callersByCallee.set(callee, uniqueSortedFuncIds(callers));

  return {
    nodes,
    edges,
    calleesBySite,
    sitesByCaller: sitesByCallerRaw,
    calleesByCaller,
    callersByCallee,
  };
}

export const EMPTY_CALL_GRAPH: CallGraph = normalizeCallGraph({ edges: [] });

export function calleesAtSite(graph: CallGraph, site: CallsiteId): readonly FuncId[] {
  return graph.calleesBySite.get(site) ?? [];
}

// Unique `caller -> callee` lines, sorted; call sites are collapsed.
export function callGraphLines(graph: CallGraph): string[] {
  const lines = graph.edges.map((e) => `${e.caller} -> ${e.callee}`);
  return uniqueSortedStrings(lines);
}
