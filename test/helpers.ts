import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { normalizeProgram } from "../src/ir.ts";
import type { IrProgram } from "../src/ir.ts";

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function loadFixture(name: string): IrProgram {
  const parsed: unknown = JSON.parse(readFileSync(fixturePath(name), "utf8"));
  return normalizeProgram(parsed);
}

// Shared named types for inline programs: an interface I with method f, implemented by C.
export const IC_TYPES = [
  { name: "P.I", underlying: "interface{f()}" },
  { name: "P.C", underlying: "int", methods: [{ name: "f", func: "(C).f" }] },
] as const;

export const C_METHOD = { name: "(C).f", recv: { name: "c", type: "P.C" } } as const;

export function programOf(functions: readonly unknown[], extra: Readonly<Record<string, unknown>> = {}): IrProgram {
  return normalizeProgram({ schemaVersion: 1, types: IC_TYPES, functions: [C_METHOD, ...functions], ...extra });
}
