import { cmpString, stableSort } from "./determinism.ts";
import { nodeKey, nodeString } from "./vta_node.ts";
import type { NodeKey, VtaNode } from "./vta_node.ts";

export type VtaEdge = Readonly<{ from: VtaNode; to: VtaNode }>;

// Read-only view handed to propagation and resolution.
export type VtaGraphView = Readonly<{
  // Insertion order; never mutates the graph.
  successors: (n: VtaNode) => readonly VtaNode[];
  hasNode: (n: VtaNode) => boolean;
  // Nodes in first-seen order.
  nodes: () => readonly VtaNode[];
  edges: () => readonly VtaEdge[];
  nodeCount: () => number;
  edgeCount: () => number;
}>;

export type VtaGraph = VtaGraphView &
  Readonly<{
    // Idempotent; returns true when the edge is new.
    addEdge: (from: VtaNode, to: VtaNode) => boolean;
  }>;

type NodeEntry = {
  node: VtaNode;
  succ: Map<NodeKey, VtaNode>;
};

const NO_SUCCESSORS: readonly VtaNode[] = [];

export function createVtaGraph(): VtaGraph {
  const entries = new Map<NodeKey, NodeEntry>();
  let edgeCount = 0;

  const entryFor = (n: VtaNode): NodeEntry => {
    const k = nodeKey(n);
    const existing = entries.get(k);
    if (existing) return existing;
    const created: NodeEntry = { node: n, succ: new Map() };
    entries.set(k, created);
    return created;
  };

  return {
    addEdge(from, to) {
      const src = entryFor(from);
      const dst = entryFor(to);
      const k = nodeKey(dst.node);
      if (src.succ.has(k)) return false;
      src.succ.set(k, dst.node);
      edgeCount++;
      return true;
    },
    successors(n) {
      const e = entries.get(nodeKey(n));
      return e ? Array.from(e.succ.values()) : NO_SUCCESSORS;
    },
    hasNode(n) {
      return entries.has(nodeKey(n));
    },
    nodes() {
      return Array.from(entries.values(), (e) => e.node);
    },
    edges() {
      const out: VtaEdge[] = [];
      for (const e of entries.values()) {
        for (const to of e.succ.values()) out.push({ from: e.node, to });
      }
      return out;
    },
    nodeCount() {
      return entries.size;
    },
    edgeCount() {
      return edgeCount;
    },
  };
}

// `node -> succ1, succ2` per node with successors; both sides sorted by display string.
export function vtaGraphLines(graph: VtaGraphView): string[] {
  const lines: string[] = [];
  for (const n of graph.nodes()) {
    const succ = graph.successors(n);
    if (succ.length === 0) continue;
    const targets = stableSort(
      succ.map((s) => nodeString(s)),
      cmpString,
    );
    lines.push(`${nodeString(n)} -> ${targets.join(", ")}`);
  }
  return stableSort(lines, cmpString);
}
