import { writeFileSync } from "node:fs";
import { resolve } from "node:path";

import { callGraphLines } from "./call_graph.ts";
import type { CallGraph } from "./call_graph.ts";
import { canonicalJsonStringify } from "./determinism.ts";
import { vtaGraphLines } from "./vta_graph.ts";
import type { VtaGraphView } from "./vta_graph.ts";

// One canonical JSON object per edge; edges are already unique and sorted by normalizeCallGraph.
export function serializeCallGraphJsonl(graph: CallGraph): string {
  if (graph.edges.length === 0) return "";

  const lines = graph.edges.map((e) => canonicalJsonStringify({ caller: e.caller, site: e.site, callee: e.callee }));
  return `${lines.join("\n")}\n`;
}

export function writeCallGraphJsonlFile(outPath: string, graph: CallGraph): void {
  writeFileSync(resolve(outPath), serializeCallGraphJsonl(graph), "utf8");
}

function serializeLines(lines: readonly string[]): string {
  return lines.length === 0 ? "" : `${lines.join("\n")}\n`;
}

export function serializeCallGraphText(graph: CallGraph): string {
  return serializeLines(callGraphLines(graph));
}

export function writeVtaGraphTextFile(outPath: string, graph: VtaGraphView): void {
  writeFileSync(resolve(outPath), serializeLines(vtaGraphLines(graph)), "utf8");
}
