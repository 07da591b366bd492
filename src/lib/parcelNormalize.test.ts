import { describe, it, expect } from "vitest";
import { fieldOrDefault, normalizeParcel, normalizeParcels, normalizeZip5, toNumber, toText } from "./parcelNormalize";

const square = {
  type: "Polygon",
  coordinates: [[[-73.99, 40.75], [-73.98, 40.75], [-73.98, 40.76], [-73.99, 40.75]]],
};

describe("normalizeZip5", () => {
  it("zero-pads and strips float suffixes", () => {
    expect(normalizeZip5("1001")).toBe("01001");
    expect(normalizeZip5(10027)).toBe("10027");
    expect(normalizeZip5("10027.0")).toBe("10027");
    expect(normalizeZip5(" 10001-1234 ")).toBe("10001");
  });

  it("treats anything else as absent", () => {
    expect(normalizeZip5("100012")).toBeNull();
    expect(normalizeZip5("1002A")).toBeNull();
    expect(normalizeZip5(10027.5)).toBeNull();
    expect(normalizeZip5("")).toBeNull();
    expect(normalizeZip5(null)).toBeNull();
  });
});

describe("value readers", () => {
  it("coerces numbers and text", () => {
    expect(toNumber("0.92")).toBe(0.92);
    expect(toNumber(" ")).toBeNull();
    expect(toNumber("abc")).toBeNull();
    expect(toNumber(Infinity)).toBeNull();
    expect(toText("  Owner LLC ")).toBe("Owner LLC");
    expect(toText(1012340001)).toBe("1012340001");
    expect(toText("")).toBeNull();
  });

  it("fieldOrDefault returns the fallback only when the value is unusable", () => {
    expect(fieldOrDefault({ newUnits: "12" }, "newUnits", toNumber, 0)).toBe(12);
    expect(fieldOrDefault({ newUnits: "n/a" }, "newUnits", toNumber, 0)).toBe(0);
    expect(fieldOrDefault({}, "owner", toText)).toBeNull();
  });
});

describe("normalizeParcel", () => {
  it("builds a typed parcel from a raw row", () => {
    const parcel = normalizeParcel({
      bbl: "1012340001",
      borough: "mn",
      address: "100 W 57 ST",
      zipcode: "10019",
      impactRatio: "0.92",
      newUnits: null,
      yearBuilt: 1931,
      owner: "TEST OWNER LLC",
      geometry: JSON.stringify(square),
    });

    expect(parcel).not.toBeNull();
    expect(parcel?.id).toBe("1012340001");
    expect(parcel?.boroughCode).toBe("MN");
    expect(parcel?.zip5).toBe("10019");
    expect(parcel?.impactRatio).toBe(0.92);
    expect(parcel?.details.newUnits).toBe(0);
    expect(parcel?.details.yearBuilt).toBe(1931);
    expect(parcel?.details.owner).toBe("TEST OWNER LLC");
    expect(parcel?.geometry?.type).toBe("Polygon");
    expect(parcel?.geometryIssue).toBeNull();
  });

  it("keeps parcels with bad geometry and records why", () => {
    const parcel = normalizeParcel({ bbl: "1", geometry: "{oops" });
    expect(parcel?.geometry).toBeNull();
    expect(parcel?.geometryIssue).toBe("parse-error");
  });

  it("rejects rows without a usable id", () => {
    expect(normalizeParcel({ bbl: "N/A" })).toBeNull();
    expect(normalizeParcel({ address: "1 MAIN ST" })).toBeNull();
  });
});

describe("normalizeParcels", () => {
  it("drops duplicate ids and tallies geometry issues", () => {
    const result = normalizeParcels([
      { bbl: "1", geometry: square },
      { bbl: "1", geometry: square },
      { bbl: "2" },
      { bbl: "3", geometry: { type: "Point", coordinates: [0, 0] } },
      { address: "no id" },
    ]);

    expect(result.parcels.map((p) => p.id)).toEqual(["1", "2", "3"]);
    expect(result.skipped).toBe(2);
    expect(result.geometryIssues).toEqual({ missing: 1, "unsupported-type": 1 });
  });
});
