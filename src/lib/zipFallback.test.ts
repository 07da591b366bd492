import { describe, it, expect } from "vitest";
import { buildZipIndex, nearestZip, resolveZips } from "./zipFallback";
import { makeParcel } from "./testing/parcelFactory";

const parcels = [
  makeParcel({ id: "a", zip5: "10001", impactRatio: 0.4 }),
  makeParcel({ id: "b", zip5: "10002", impactRatio: 0.005 }),
  makeParcel({ id: "c", zip5: "10002", impactRatio: null }),
  makeParcel({ id: "d", zip5: "10027", impactRatio: 1.2 }),
];

describe("nearestZip", () => {
  it("picks the smallest numeric distance", () => {
    expect(nearestZip("10099", ["10001", "10002", "10027"])).toBe("10027");
  });

  it("breaks ties toward the lower ZIP", () => {
    expect(nearestZip("10014", ["10027", "10001"])).toBe("10001");
  });

  it("returns null for an empty pool", () => {
    expect(nearestZip("10001", [])).toBeNull();
  });
});

describe("buildZipIndex", () => {
  it("separates available ZIPs from colored ones", () => {
    const index = buildZipIndex(parcels);
    expect([...index.available].sort()).toEqual(["10001", "10002", "10027"]);
    expect([...index.colored].sort()).toEqual(["10001", "10027"]);
  });
});

describe("resolveZips", () => {
  it("substitutes the nearest available ZIP when the requested one is missing", () => {
    const result = resolveZips(["10099"], parcels);
    expect(result.zips).toEqual(["10027"]);
    expect(result.notices).toEqual(["10099 not found, using 10027"]);
  });

  it("falls back to the nearest colored ZIP when the ZIP has no signal", () => {
    const result = resolveZips(["10002"], parcels);
    expect(result.zips).toEqual(["10001"]);
    expect(result.substitutions).toEqual([{ kind: "no-signal", requested: "10002", resolved: "10001" }]);
    expect(result.notices).toEqual(["10002 has no colored properties, using 10001"]);
  });

  it("can apply both stages to one token", () => {
    const result = resolveZips(["10003"], parcels);
    expect(result.zips).toEqual(["10001"]);
    expect(result.notices).toEqual([
      "10003 not found, using 10002",
      "10002 has no colored properties, using 10001",
    ]);
  });

  it("leaves valid colored ZIPs alone", () => {
    const result = resolveZips(["10027", "10001"], parcels);
    expect(result.zips).toEqual(["10027", "10001"]);
    expect(result.notices).toEqual([]);
  });

  it("is idempotent on its own output", () => {
    const first = resolveZips(["10099", "10002"], parcels);
    const second = resolveZips(first.zips, parcels);
    expect(second.zips).toEqual(first.zips);
    expect(second.notices).toEqual([]);
  });

  it("deduplicates tokens that resolve to the same ZIP, first seen first", () => {
    const result = resolveZips(["10099", "10027", "10050", "10099"], parcels);
    expect(result.zips).toEqual(["10027"]);
    expect(result.notices).toEqual(["10099 not found, using 10027", "10050 not found, using 10027"]);
  });

  it("reports a shared signal-stage fallback once", () => {
    const result = resolveZips(["10003", "10004"], parcels);
    expect(result.zips).toEqual(["10001"]);
    expect(result.notices).toEqual([
      "10003 not found, using 10002",
      "10002 has no colored properties, using 10001",
      "10004 not found, using 10002",
    ]);
  });

  it("keeps the token unchanged with no notice when there is nothing to fall back to", () => {
    const result = resolveZips(["10001"], []);
    expect(result.zips).toEqual(["10001"]);
    expect(result.notices).toEqual([]);
  });

  it("skips the signal stage when no ZIP is colored", () => {
    const gray = [makeParcel({ id: "x", zip5: "11201", impactRatio: 0 })];
    const result = resolveZips(["11215"], gray);
    expect(result.zips).toEqual(["11201"]);
    expect(result.notices).toEqual(["11215 not found, using 11201"]);
  });
});
