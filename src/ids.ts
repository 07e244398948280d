import { cmpNumber, cmpString } from "./determinism.ts";

type BrandedString<B extends string> = string & { readonly __brand: B };

// Function display names as emitted by the front end, e.g. "g", "(C).f", "f$1", "F[P.A]".
export type FuncId = BrandedString<"FuncId">;

// By architecture, a call site is the index of a call instruction within its enclosing function.
export type CallsiteId = BrandedString<"CallsiteId">;

export type CallsiteIdParts = Readonly<{
  funcId: FuncId;
  instrIndex: number;
}>;

function assertNonEmptyString(value: string, label: string): void {
  if (value.length === 0) throw new Error(`${label} must be a non-empty string`);
}

function assertNonNegativeSafeInt(value: number, label: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new Error(`${label} must be a non-negative safe integer; got ${value}`);
  }
  return value;
}

function parseCanonicalNonNegativeInt(text: string, label: string): number {
  if (!/^(0|[1-9][0-9]*)$/.test(text)) {
    throw new Error(`${label} must be a canonical non-negative int; got ${JSON.stringify(text)}`);
  }
  const n = Number(text);
  if (!Number.isSafeInteger(n)) throw new Error(`${label} is out of range; got ${JSON.stringify(text)}`);
  return n;
}

function decodeCanonicalUriComponent(encoded: string, label: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(encoded);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${label} is not valid URI component encoding: ${JSON.stringify(encoded)} (${msg})`);
  }

  const reencoded = encodeURIComponent(decoded);
  if (reencoded !== encoded) {
    throw new Error(
      `${label} must use canonical URI component encoding; expected ${JSON.stringify(reencoded)}, got ${JSON.stringify(encoded)}`,
    );
  }

  return decoded;
}

export function createFuncId(name: string): FuncId {
  assertNonEmptyString(name, "FuncId");
  if (/\s/.test(name)) throw new Error(`FuncId must not contain whitespace; got ${JSON.stringify(name)}`);
  return name as FuncId;
}

export function cmpFuncId(a: FuncId, b: FuncId): number {
  return cmpString(a, b);
}

export function createCallsiteId(funcId: FuncId, instrIndex: number): CallsiteId {
  const i = assertNonNegativeSafeInt(instrIndex, "instrIndex");
  return `c:${encodeURIComponent(funcId)}:${i}` as CallsiteId;
}

function parseCallsiteIdParts(text: string): CallsiteIdParts {
  const parts = text.split(":");
  if (parts.length !== 3 || parts[0] !== "c") {
    throw new Error(`Invalid CallsiteId: ${JSON.stringify(text)}`);
  }
  const funcId = createFuncId(decodeCanonicalUriComponent(parts[1]!, "CallsiteId.funcId"));
  const instrIndex = parseCanonicalNonNegativeInt(parts[2]!, "CallsiteId.instrIndex");
  return { funcId, instrIndex };
}

export function parseCallsiteId(text: string): CallsiteId {
  const p = parseCallsiteIdParts(text);
  const canonical = createCallsiteId(p.funcId, p.instrIndex);
  if (canonical !== text) {
    throw new Error(`Non-canonical CallsiteId: expected ${JSON.stringify(canonical)}, got ${JSON.stringify(text)}`);
  }
  return canonical;
}

export function callsiteIdToParts(id: CallsiteId): CallsiteIdParts {
  return parseCallsiteIdParts(id);
}

export function cmpCallsiteId(a: CallsiteId, b: CallsiteId): number {
  const ap = callsiteIdToParts(a);
  const bp = callsiteIdToParts(b);
  return cmpFuncId(ap.funcId, bp.funcId) || cmpNumber(ap.instrIndex, bp.instrIndex);
}
