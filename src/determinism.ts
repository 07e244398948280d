import { createHash } from "node:crypto";

export type Comparator<T> = (a: T, b: T) => number;

export function cmpString(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function cmpNumber(a: number, b: number): number {
  if (!Number.isFinite(a) || !Number.isFinite(b)) {
    throw new Error(`cmpNumber requires finite numbers; got ${a} and ${b}`);
  }
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// Stable and deterministic sorting independent of engine-level sort stability.
export function stableSort<T>(values: readonly T[], cmpT: Comparator<T>): T[] {
  const decorated = values.map((value, index) => ({ value, index }));
  decorated.sort((a, b) => {
    const c = cmpT(a.value, b.value);
    if (!Number.isFinite(c)) throw new Error(`Comparator returned non-finite value: ${c}`);
    if (c !== 0) return c;
    return a.index - b.index;
  });
  return decorated.map((d) => d.value);
}

export function uniqueSortedStrings(values: Iterable<string>): string[] {
  return stableSort(Array.from(new Set(values)), cmpString);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== "object") return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function canonicalJsonStringify(value: unknown): string {
  const stack = new Set<object>();

  const stringifyInner = (v: unknown): string => {
    if (v === null) return "null";

    if (typeof v === "string") return JSON.stringify(v);
    if (typeof v === "number") {
      if (!Number.isFinite(v)) throw new Error(`Non-finite number is not valid JSON: ${v}`);
      return JSON.stringify(v);
    }
    if (typeof v === "boolean") return v ? "true" : "false";
    if (typeof v === "bigint") throw new Error("bigint is not valid JSON");
    if (typeof v === "undefined") throw new Error("undefined is not valid JSON");
    if (typeof v === "function" || typeof v === "symbol") throw new Error(`${typeof v} is not valid JSON`);

    if (Array.isArray(v)) {
      if (stack.has(v)) throw new Error("Cycle detected while stringifying JSON");
      stack.add(v);
      const parts = v.map((el: unknown) => {
        if (el === undefined) return "null"; // Match JSON.stringify array semantics.
        if (typeof el === "function" || typeof el === "symbol") return "null";
        return stringifyInner(el);
      });
      stack.delete(v);
      return `[${parts.join(",")}]`;
    }

    if (!isPlainObject(v)) {
      const name = v.constructor?.name;
      throw new Error(`Only plain objects are supported in canonical JSON; got ${name ?? "(unknown)"}`);
    }
    if (stack.has(v)) throw new Error("Cycle detected while stringifying JSON");
    stack.add(v);

    const keys = Object.keys(v).sort(cmpString);
    const parts: string[] = [];
    for (const k of keys) {
      const val = v[k];
      if (val === undefined) continue; // Match JSON.stringify object semantics.
      if (typeof val === "function" || typeof val === "symbol") continue;
      parts.push(`${JSON.stringify(k)}:${stringifyInner(val)}`);
    }

    stack.delete(v);
    return `{${parts.join(",")}}`;
  };

  return stringifyInner(value);
}

export function sha256HexFromUtf8(text: string): string {
  const h = createHash("sha256");
  h.update(text, "utf8");
  return h.digest("hex");
}
