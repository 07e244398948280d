#!/usr/bin/env -S node --import tsx
import { readFileSync, realpathSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { loadBaselineCallGraphFromFile } from "./baseline_callgraph.ts";
import type { CallGraph } from "./call_graph.ts";
import { writeCallGraphJsonlFile, writeVtaGraphTextFile } from "./call_graph_jsonl.ts";
import { chaCallGraph, staticCallGraph } from "./cha.ts";
import { writeExplainBundlesDir } from "./explain_bundle.ts";
import { loadProgramFromFile } from "./ir.ts";
import type { IrProgram } from "./ir.ts";
import { computeVtaCallGraph } from "./vta.ts";
import type { VtaStats } from "./vta.ts";

export type BaselineMode = "cha" | "static";

function getVersion(): string {
  try {
    const pkgUrl = new URL("../package.json", import.meta.url);
    const pkg: unknown = JSON.parse(readFileSync(pkgUrl, "utf8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") return pkg.version;
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

function helpText(version: string): string {
  return [
    `vtagraph v${version}`,
    "Call graph construction by variable type analysis over an SSA program document.",
    "",
    "Usage:",
    "  vtagraph analyze --program <file> --out <edges.jsonl> [--baseline <file> | --baseline-mode cha|static] [--graph <file>] [--explain <dir>] [--max-rounds <n>] [--verbose]",
    "",
    "Commands:",
    "  analyze    Compute the call graph",
    "",
    "Options:",
    "  -h, --help           Show help",
    "      --version        Show version",
    "      --baseline       Baseline call graph (JSON) to augment",
    "      --baseline-mode  Built-in baseline when --baseline is absent (default: cha)",
    "      --graph          Write the type propagation graph (text)",
    "      --explain        Write per-site explain bundles",
    "      --max-rounds     Bound on propagation rounds",
    "      --verbose        Print pipeline statistics to stderr",
    "",
  ].join("\n");
}

type AnalyzeArgs = Readonly<{
  program?: string;
  out?: string;
  baseline?: string;
  baselineMode: BaselineMode;
  graph?: string;
  explain?: string;
  maxRounds?: number;
  verbose: boolean;
  help: boolean;
}>;

function parseAnalyzeArgs(argv: string[]): AnalyzeArgs {
  const args: {
    program?: string;
    out?: string;
    baseline?: string;
    baselineMode: BaselineMode;
    graph?: string;
    explain?: string;
    maxRounds?: number;
    verbose: boolean;
    help: boolean;
  } = { baselineMode: "cha", verbose: false, help: false };

  const takeValue = (flag: string, i: number): string => {
    const v = argv[i + 1];
    if (typeof v !== "string" || v.startsWith("-")) {
      throw new Error(`${flag} requires a value`);
    }
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]!;
    if (a === "--help" || a === "-h") {
      args.help = true;
      continue;
    }
    if (a === "--verbose") {
      args.verbose = true;
      continue;
    }

    if (a === "--program") {
      args.program = takeValue(a, i);
      i++;
      continue;
    }
    if (a === "--out") {
      args.out = takeValue(a, i);
      i++;
      continue;
    }
    if (a === "--baseline") {
      args.baseline = takeValue(a, i);
      i++;
      continue;
    }
    if (a === "--baseline-mode") {
      const v = takeValue(a, i);
      if (v !== "cha" && v !== "static") throw new Error(`--baseline-mode must be "cha" or "static"; got ${JSON.stringify(v)}`);
      args.baselineMode = v;
      i++;
      continue;
    }
    if (a === "--graph") {
      args.graph = takeValue(a, i);
      i++;
      continue;
    }
    if (a === "--explain") {
      args.explain = takeValue(a, i);
      i++;
      continue;
    }
    if (a === "--max-rounds") {
      const v = takeValue(a, i);
      const n = Number(v);
      if (!/^[1-9][0-9]*$/.test(v) || !Number.isSafeInteger(n)) {
        throw new Error(`--max-rounds must be a positive integer; got ${JSON.stringify(v)}`);
      }
      args.maxRounds = n;
      i++;
      continue;
    }

    throw new Error(`Unknown option: ${a}`);
  }

  return args;
}

function formatStats(stats: VtaStats): string {
  return [
    `functions=${stats.functions}`,
    `nodes=${stats.graphNodes}`,
    `edges=${stats.graphEdges}`,
    `rounds=${stats.rounds}`,
    `types=${stats.typeUniverseSize}`,
    `dynamicSites=${stats.dynamicSites}`,
    `staticSites=${stats.staticSites}`,
    `baselineEdges=${stats.baselineEdges}`,
    `callEdges=${stats.callGraphEdges}`,
    `added=${stats.addedEdges}`,
  ].join(" ");
}

function selectBaseline(args: AnalyzeArgs, program: IrProgram): CallGraph {
  if (args.baseline) return loadBaselineCallGraphFromFile(resolve(args.baseline), program);
  return args.baselineMode === "static" ? staticCallGraph(program) : chaCallGraph(program);
}

function cmdAnalyze(argv: string[], version: string): number {
  let args: AnalyzeArgs;
  try {
    args = parseAnalyzeArgs(argv);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`vtagraph analyze: ${msg}\n\n`);
    process.stdout.write(helpText(version));
    return 1;
  }

  if (args.help) {
    process.stdout.write(helpText(version));
    return 0;
  }

  if (!args.program) {
    process.stderr.write("vtagraph analyze: missing required --program <file>\n");
    return 1;
  }

  if (!args.out) {
    process.stderr.write("vtagraph analyze: missing required --out <edges.jsonl>\n");
    return 1;
  }

  try {
    const program = loadProgramFromFile(resolve(args.program));
    const baseline = selectBaseline(args, program);
    const result = computeVtaCallGraph(program, { baseline, maxRounds: args.maxRounds });

    writeCallGraphJsonlFile(resolve(args.out), result.callGraph);
    if (args.graph) writeVtaGraphTextFile(resolve(args.graph), result.graph);
    if (args.explain) writeExplainBundlesDir(resolve(args.explain), result.resolutions, result.stats);
    if (args.verbose) process.stderr.write(`vtagraph analyze: ${formatStats(result.stats)}\n`);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`vtagraph analyze: ${msg}\n`);
    return 1;
  }
}

export function main(argv: string[]): number {
  const version = getVersion();

  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    process.stdout.write(helpText(version));
    return 0;
  }

  if (argv.includes("--version")) {
    process.stdout.write(`${version}\n`);
    return 0;
  }

  const [command] = argv;
  if (command === "analyze") {
    return cmdAnalyze(argv.slice(1), version);
  }

  process.stderr.write(`Unknown command: ${command}\n\n`);
  process.stdout.write(helpText(version));
  return 1;
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) return false;
  try {
    return realpathSync(invoked) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) process.exitCode = main(process.argv.slice(2));
