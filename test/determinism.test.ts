import * as fc from "fast-check";
import { describe, expect, it } from "vitest";

import { canonicalJsonStringify, cmpNumber, cmpString, stableSort, uniqueSortedStrings } from "../src/determinism.ts";

describe("canonicalJsonStringify", () => {
  it("sorts object keys at every level", () => {
    expect(canonicalJsonStringify({ b: 1, a: { d: [true, null], c: "x" } })).toBe(
      '{"a":{"c":"x","d":[true,null]},"b":1}',
    );
  });

  it("drops undefined members and rejects values JSON cannot hold", () => {
    expect(canonicalJsonStringify({ a: undefined, b: [undefined] })).toBe('{"b":[null]}');
    expect(() => canonicalJsonStringify(Number.NaN)).toThrow("Non-finite number is not valid JSON: NaN");
    expect(() => canonicalJsonStringify(new Map())).toThrow(
      "Only plain objects are supported in canonical JSON; got Map",
    );
  });
});

describe("stableSort", () => {
  it("keeps the input order of equal elements", () => {
    const items = [
      { k: 2, id: "a" },
      { k: 1, id: "b" },
      { k: 2, id: "c" },
      { k: 1, id: "d" },
    ];
    expect(stableSort(items, (x, y) => cmpNumber(x.k, y.k)).map((x) => x.id)).toEqual(["b", "d", "a", "c"]);
  });

  it("matches code unit order for strings", () => {
    fc.assert(
      fc.property(fc.array(fc.string()), (values) => {
        const sorted = uniqueSortedStrings(values);
        for (let i = 1; i < sorted.length; i++) {
          const prev = sorted[i - 1] ?? "";
          const cur = sorted[i] ?? "";
          expect(cmpString(prev, cur)).toBe(-1);
        }
        expect(new Set(sorted)).toEqual(new Set(values));
      }),
    );
  });
});
