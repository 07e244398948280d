import type { CallGraph } from "./call_graph.ts";
import { resolveCallGraph } from "./call_resolver.ts";
import type { SiteResolution } from "./call_resolver.ts";
import { chaCallGraph } from "./cha.ts";
import type { IrProgram } from "./ir.ts";
import { propagateTypes } from "./propagation.ts";
import type { PropagationResult, PropagationView } from "./propagation.ts";
import { buildTypePropGraph } from "./vta_builder.ts";
import type { VtaBuildResult } from "./vta_builder.ts";
import type { VtaGraphView } from "./vta_graph.ts";

export type VtaOptions = Readonly<{
  // Defaults to class hierarchy analysis over the program.
  baseline?: CallGraph;
  // Propagation round bound; see PropagationOptions.maxRounds.
  maxRounds?: number;
  observe?: (round: number, view: PropagationView) => void;
}>;

export type VtaStats = Readonly<{
  functions: number;
  graphNodes: number;
  graphEdges: number;
  rounds: number;
  typeUniverseSize: number;
  dynamicSites: number;
  staticSites: number;
  baselineEdges: number;
  callGraphEdges: number;
  // Edges the resolver added on top of the baseline.
  addedEdges: number;
}>;

export type VtaResult = Readonly<{
  callGraph: CallGraph;
  baseline: CallGraph;
  graph: VtaGraphView;
  build: VtaBuildResult;
  propagation: PropagationResult;
  resolutions: readonly SiteResolution[];
  stats: VtaStats;
}>;

export function computeVtaCallGraph(program: IrProgram, options: VtaOptions = {}): VtaResult {
  const baseline = options.baseline ?? chaCallGraph(program);

  const build = buildTypePropGraph(program, baseline);
  const propagation = propagateTypes(build.graph, program.types, {
    maxRounds: options.maxRounds,
    observe: options.observe,
  });
  const { callGraph, resolutions } = resolveCallGraph({ program, baseline, build, propagation });

  const stats: VtaStats = {
    functions: program.functions.length,
    graphNodes: build.graph.nodeCount(),
    graphEdges: build.graph.edgeCount(),
    rounds: propagation.rounds,
    typeUniverseSize: propagation.typeUniverseSize,
    dynamicSites: build.dynamicSites.length,
    staticSites: build.staticSites.length,
    baselineEdges: baseline.edges.length,
    callGraphEdges: callGraph.edges.length,
    addedEdges: callGraph.edges.length - baseline.edges.length,
  };

  return { callGraph, baseline, graph: build.graph, build, propagation, resolutions, stats };
}
