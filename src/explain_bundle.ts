import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";

import type { SiteResolution } from "./call_resolver.ts";
import { canonicalJsonStringify, sha256HexFromUtf8, stableSort } from "./determinism.ts";
import { callsiteIdToParts, cmpCallsiteId } from "./ids.ts";
import type { CallsiteId, FuncId } from "./ids.ts";
import { typeString } from "./types.ts";
import type { VtaStats } from "./vta.ts";
import { nodeString } from "./vta_node.ts";

export const EXPLAIN_BUNDLE_SCHEMA_VERSION = 1 as const;
export const EXPLAIN_MANIFEST_SCHEMA_VERSION = 1 as const;

export type SiteExplainBundle = Readonly<{
  schemaVersion: typeof EXPLAIN_BUNDLE_SCHEMA_VERSION;
  kind: "site_explain";
  site: CallsiteId;
  caller: FuncId;
  instrIndex: number;
  callKind: SiteResolution["kind"];
  method: string | null;
  operand: string;
  reachingTypes: ReadonlyArray<Readonly<{ type: string; func: FuncId | null }>>;
  resolved: readonly FuncId[];
  baseline: readonly FuncId[];
  // Resolved callees missing from the baseline.
  added: readonly FuncId[];
}>;

export type ExplainManifestEntry = Readonly<{
  site: CallsiteId;
  siteHash: string;
  bundlePath: string;
}>;

export type ExplainManifest = Readonly<{
  schemaVersion: typeof EXPLAIN_MANIFEST_SCHEMA_VERSION;
  kind: "explain_manifest";
  stats: VtaStats;
  sites: readonly ExplainManifestEntry[];
}>;

function siteHash(site: CallsiteId): string {
  // Avoid embedding CallsiteId directly in filenames (":" is invalid on Windows).
  return sha256HexFromUtf8(site);
}

export function siteExplainBundle(r: SiteResolution): SiteExplainBundle {
  const baseline = new Set<FuncId>(r.baseline);
  return {
    schemaVersion: EXPLAIN_BUNDLE_SCHEMA_VERSION,
    kind: "site_explain",
    site: r.site,
    caller: r.caller,
    instrIndex: callsiteIdToParts(r.site).instrIndex,
    callKind: r.kind,
    method: r.method,
    operand: nodeString(r.operand),
    reachingTypes: r.reachingTypes.map((p) => ({ type: typeString(p.type), func: p.func })),
    resolved: r.resolved,
    baseline: r.baseline,
    added: r.resolved.filter((f) => !baseline.has(f)),
  };
}

export function writeExplainBundlesDir(
  outDir: string,
  resolutions: readonly SiteResolution[],
  stats: VtaStats,
): ExplainManifest {
  const outAbs = resolve(outDir);
  const sitesDir = join(outAbs, "sites");

  // Keep output deterministic: clear only our managed subtree.
  rmSync(sitesDir, { recursive: true, force: true });
  mkdirSync(sitesDir, { recursive: true });

  const sorted = stableSort([...resolutions], (a, b) => cmpCallsiteId(a.site, b.site));

  const entries: ExplainManifestEntry[] = [];
  for (const r of sorted) {
    const hash = siteHash(r.site);
    const fileName = `${hash}.json`;
    writeFileSync(join(sitesDir, fileName), `${canonicalJsonStringify(siteExplainBundle(r))}\n`, "utf8");
    entries.push({ site: r.site, siteHash: hash, bundlePath: `sites/${fileName}` });
  }

  const manifest: ExplainManifest = {
    schemaVersion: EXPLAIN_MANIFEST_SCHEMA_VERSION,
    kind: "explain_manifest",
    stats,
    sites: entries,
  };
  writeFileSync(join(outAbs, "manifest.json"), `${canonicalJsonStringify(manifest)}\n`, "utf8");
  return manifest;
}
