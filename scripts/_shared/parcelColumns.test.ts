import { describe, expect, it } from "vitest";
import { featureToSeedRow } from "./parcelColumns";

const polygon = {
  type: "Polygon",
  coordinates: [
    [
      [-73.99, 40.75],
      [-73.98, 40.75],
      [-73.98, 40.76],
      [-73.99, 40.75],
    ],
  ],
};

describe("featureToSeedRow", () => {
  it("maps export columns onto the parcel entity", () => {
    const row = featureToSeedRow({
      geometry: polygon,
      properties: {
        BBL_10: 1012340001,
        Borough_x: "mn",
        Zipcode: "10019.0",
        Address_x: " 100 WEST 57 STREET ",
        "% of New Units Impact": "0.92",
        "New Units": 14,
        "# of Floors": "6",
        ZoneDist1: "C6-4",
        OwnerName: "",
        "Year Built": null,
      },
    });

    expect(row).toEqual({
      bbl: "1012340001",
      borough: "MN",
      zipcode: "10019",
      address: "100 WEST 57 STREET",
      impactRatio: 0.92,
      newUnits: 14,
      existingFloors: 6,
      zoningDistrict: "C6-4",
      geometry: polygon,
    });
  });

  it("falls back to the BBL and Borough columns and serialized geometry", () => {
    const row = featureToSeedRow({
      geometry: null,
      properties: { BBL: "3001230045", Borough: "BK", geom_geojson: JSON.stringify(polygon) },
    });
    expect(row).toEqual({ bbl: "3001230045", borough: "BK", geometry: polygon });
  });

  it("keeps rows with unusable geometry but leaves the field out", () => {
    const row = featureToSeedRow({ geometry: { type: "Point", coordinates: [1, 2] }, properties: { BBL: "4" } });
    expect(row).toEqual({ bbl: "4" });
  });

  it("returns null without a BBL", () => {
    expect(featureToSeedRow({ geometry: polygon, properties: { Address_x: "1 Main St" } })).toBeNull();
    expect(featureToSeedRow({ geometry: polygon, properties: null })).toBeNull();
  });
});
