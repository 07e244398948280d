export * from "./types.ts";
export * from "./ids.ts";
export * from "./ir.ts";
export * from "./vta_node.ts";
export * from "./vta_graph.ts";
export * from "./call_graph.ts";
export * from "./cha.ts";
export * from "./baseline_callgraph.ts";
export * from "./vta_builder.ts";
export * from "./propagation.ts";
export * from "./call_resolver.ts";
export * from "./vta.ts";
export * from "./call_graph_jsonl.ts";
export * from "./explain_bundle.ts";
