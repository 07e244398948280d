import { calleesAtSite, normalizeCallGraph } from "./call_graph.ts";
import type { CallEdge, CallGraph } from "./call_graph.ts";
import { stableSort } from "./determinism.ts";
import { cmpFuncId } from "./ids.ts";
import type { CallsiteId, FuncId } from "./ids.ts";
import type { IrProgram } from "./ir.ts";
import type { PropType, PropagationView } from "./propagation.ts";
import { asInterface, lookupMethod } from "./types.ts";
import type { TypeTable } from "./types.ts";
import type { DynamicCallKind, DynamicCallSite, VtaBuildResult } from "./vta_builder.ts";
import type { VtaNode } from "./vta_node.ts";

export type SiteResolution = Readonly<{
  site: CallsiteId;
  caller: FuncId;
  kind: DynamicCallKind;
  operand: VtaNode;
  method: string | null;
  reachingTypes: readonly PropType[];
  // Callees implied by the reaching types (unique, sorted).
  resolved: readonly FuncId[];
  // Callees the baseline already had at this site (unique, sorted).
  baseline: readonly FuncId[];
}>;

export type ResolveInputs = Readonly<{
  program: IrProgram;
  baseline: CallGraph;
  build: VtaBuildResult;
  propagation: PropagationView;
}>;

export type ResolveResult = Readonly<{
  callGraph: CallGraph;
  // One per dynamic site, in build order.
  resolutions: readonly SiteResolution[];
}>;

export function calleesForTypes(site: DynamicCallSite, types: readonly PropType[], table: TypeTable): FuncId[] {
  const out = new Set<FuncId>();
  for (const p of types) {
    if (site.kind === "func_value") {
      if (p.func !== null) out.add(p.func);
      continue;
    }
    // Interface types never name a method implementation.
    if (site.method === null || asInterface(p.type, table) !== null) continue;
    const m = lookupMethod(p.type, site.method, table);
    if (m) out.add(m.func);
  }
  return stableSort(Array.from(out), cmpFuncId);
}

// Baseline edges are kept; VTA only adds edges at call sites it can resolve.
export function resolveCallGraph(inputs: ResolveInputs): ResolveResult {
  const { program, baseline, build, propagation } = inputs;
  const edges: CallEdge[] = [...baseline.edges];

  for (const s of build.staticSites) edges.push({ caller: s.caller, site: s.site, callee: s.callee });

  const resolutions: SiteResolution[] = [];
  for (const site of build.dynamicSites) {
    const reachingTypes = propagation.typesOf(site.operand);
    const resolved = calleesForTypes(site, reachingTypes, program.types);
    for (const callee of resolved) edges.push({ caller: site.caller, site: site.site, callee });
    resolutions.push({
      site: site.site,
      caller: site.caller,
      kind: site.kind,
      operand: site.operand,
      method: site.method,
      reachingTypes,
      resolved,
      baseline: calleesAtSite(baseline, site.site),
    });
  }

  const callGraph = normalizeCallGraph({ nodes: program.functions.map((f) => f.id), edges });
  return { callGraph, resolutions };
}
