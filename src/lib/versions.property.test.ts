import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { compareVersions } from "./semver.js";
import { applyRetractions, isRetractedBy, uniqueVersions } from "./versions.js";
import type { VersionRecord } from "../types.js";

// ---------------------------------------------------------------------------
// Arbitraries
// ---------------------------------------------------------------------------

const versionArb = fc
  .tuple(
    fc.nat({ max: 3 }),
    fc.nat({ max: 3 }),
    fc.nat({ max: 3 }),
    fc.constantFrom("", "-alpha", "-rc.1", "-rc.2"),
    fc.constantFrom("", "+build"),
  )
  .map(([major, minor, patch, pre, build]) => `v${major}.${minor}.${patch}${pre}${build}`);

const recordArb: fc.Arbitrary<VersionRecord> = versionArb.map((version) => ({
  version,
  retracted: false,
}));

const rangeArb = fc
  .tuple(versionArb, versionArb)
  .map(([a, b]): [string, string] => (compareVersions(a, b) <= 0 ? [a, b] : [b, a]));

// ---------------------------------------------------------------------------
// Properties
// ---------------------------------------------------------------------------

describe("uniqueVersions properties", () => {
  it("returns strictly descending versions", () => {
    fc.assert(
      fc.property(fc.array(recordArb), (records) => {
        const result = uniqueVersions(records);
        for (let i = 1; i < result.length; i++) {
          expect(compareVersions(result[i - 1].version, result[i].version)).toBe(1);
        }
      }),
      { numRuns: 100 },
    );
  });

  it("keeps one entry for every distinct input version", () => {
    fc.assert(
      fc.property(fc.array(recordArb), (records) => {
        const result = uniqueVersions(records);
        for (const record of records) {
          const matches = result.filter(
            (r) => compareVersions(r.version, record.version) === 0,
          );
          expect(matches).toHaveLength(1);
        }
      }),
      { numRuns: 100 },
    );
  });
});

describe("retraction properties", () => {
  it("includes both bounds of a range", () => {
    fc.assert(
      fc.property(rangeArb, ([low, high]) => {
        const range = { low, high, reason: "" };
        expect(isRetractedBy(low, range)).toBe(true);
        expect(isRetractedBy(high, range)).toBe(true);
      }),
      { numRuns: 100 },
    );
  });

  it("marks exactly the versions inside some range", () => {
    fc.assert(
      fc.property(fc.array(recordArb), fc.array(rangeArb, { maxLength: 3 }), (records, pairs) => {
        const ranges = pairs.map(([low, high]) => ({ low, high, reason: "r" }));
        const result = applyRetractions(records, ranges);

        result.forEach((record, i) => {
          const inside = ranges.some(
            (range) =>
              compareVersions(records[i].version, range.low) >= 0 &&
              compareVersions(records[i].version, range.high) <= 0,
          );
          expect(record.retracted).toBe(inside);
        });
      }),
      { numRuns: 100 },
    );
  });
});
