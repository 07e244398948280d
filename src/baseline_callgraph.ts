import { readFileSync } from "node:fs";

import { normalizeCallGraph } from "./call_graph.ts";
import type { CallEdge, CallGraph } from "./call_graph.ts";
import { createCallsiteId, createFuncId } from "./ids.ts";
import type { IrProgram } from "./ir.ts";

export const BASELINE_CALL_GRAPH_SCHEMA_VERSION = 1 as const;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== "object") return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function expectPlainObject(value: unknown, label: string): Record<string, unknown> {
  if (!isPlainObject(value)) {
    const t = value === null ? "null" : typeof value;
    throw new Error(`${label} must be a plain object; got ${t}`);
  }
  return value;
}

function expectString(value: unknown, label: string): string {
  if (typeof value !== "string") throw new Error(`${label} must be a string`);
  return value;
}

function expectArray(value: unknown, label: string): unknown[] {
  if (!Array.isArray(value)) throw new Error(`${label} must be an array`);
  return value;
}

function assertNoExtraKeys(obj: Record<string, unknown>, allowed: readonly string[], label: string): void {
  const allowedSet = new Set(allowed);
  for (const k of Object.keys(obj)) {
    if (!allowedSet.has(k)) throw new Error(`${label} has unknown key ${JSON.stringify(k)}`);
  }
}

function assertNonNegativeSafeInt(value: unknown, label: string): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    throw new Error(`${label} must be a non-negative safe integer; got ${JSON.stringify(value)}`);
  }
  return value;
}

function normalizeEdge(value: unknown, program: IrProgram, label: string): CallEdge {
  const obj = expectPlainObject(value, label);
  assertNoExtraKeys(obj, ["caller", "site", "callee"], label);

  const caller = createFuncId(expectString(obj.caller, `${label}.caller`));
  const callee = createFuncId(expectString(obj.callee, `${label}.callee`));
  const callerFn = program.functionById.get(caller);
  if (!callerFn) throw new Error(`${label}.caller references unknown function: ${JSON.stringify(caller)}`);
  if (!program.functionById.has(callee)) {
    throw new Error(`${label}.callee references unknown function: ${JSON.stringify(callee)}`);
  }

  const index = assertNonNegativeSafeInt(obj.site, `${label}.site`);
  const instr = callerFn.instrs[index];
  if (!instr || instr.kind !== "call") {
    throw new Error(`${label}.site must be the index of a call instruction in ${caller}; got ${index}`);
  }

  return { caller, site: createCallsiteId(caller, index), callee };
}

// A call graph produced by an external tool, restated over this program's functions and call sites.
export function normalizeBaselineCallGraph(value: unknown, program: IrProgram): CallGraph {
  const obj = expectPlainObject(value, "BaselineCallGraph");
  assertNoExtraKeys(obj, ["schemaVersion", "edges"], "BaselineCallGraph");

  const schemaVersion = obj.schemaVersion;
  if (schemaVersion !== BASELINE_CALL_GRAPH_SCHEMA_VERSION) {
    throw new Error(
      `BaselineCallGraph.schemaVersion must be ${BASELINE_CALL_GRAPH_SCHEMA_VERSION}; got ${JSON.stringify(schemaVersion)}`,
    );
  }

  const rawEdges = expectArray(obj.edges, "BaselineCallGraph.edges");
  const edges: CallEdge[] = [];
  for (let i = 0; i < rawEdges.length; i++) {
    edges.push(normalizeEdge(rawEdges[i], program, `BaselineCallGraph.edges[${i}]`));
  }

  return normalizeCallGraph({ nodes: program.functions.map((f) => f.id), edges });
}

export function loadBaselineCallGraphFromFile(filePath: string, program: IrProgram): CallGraph {
  const raw = readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse baseline call graph JSON: file=${JSON.stringify(filePath)} error=${msg}`);
  }
  try {
    return normalizeBaselineCallGraph(parsed, program);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid baseline call graph: file=${JSON.stringify(filePath)} error=${msg}`);
  }
}
