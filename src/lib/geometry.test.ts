import { describe, it, expect } from "vitest";
import {
  anchorPoint,
  bboxCenter,
  bounds,
  parseGeometry,
  unionBounds,
  unionGeometryBounds,
  zoomForSpan,
} from "./geometry";
import type { ParcelGeometry } from "../types/parcel";

const polygon: ParcelGeometry = {
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

const multiPolygon: ParcelGeometry = {
  type: "MultiPolygon",
  coordinates: [
    [[[-73.95, 40.7], [-73.94, 40.71], [-73.95, 40.7]]],
    [[[-74.01, 40.72], [-74.0, 40.69], [-74.01, 40.72]]],
  ],
};

describe("parseGeometry", () => {
  it("parses a polygon from a GeoJSON string", () => {
    const result = parseGeometry(JSON.stringify(polygon));
    expect(result).toEqual({ ok: true, geometry: polygon });
  });

  it("accepts already-parsed multipolygons", () => {
    expect(parseGeometry(multiPolygon)).toEqual({ ok: true, geometry: multiPolygon });
  });

  it("distinguishes missing, unparseable, unsupported and empty input", () => {
    expect(parseGeometry(null)).toEqual({ ok: false, issue: "missing" });
    expect(parseGeometry("")).toEqual({ ok: false, issue: "missing" });
    expect(parseGeometry("{not json")).toEqual({ ok: false, issue: "parse-error" });
    expect(parseGeometry({ type: "Polygon", coordinates: [[["a", 1]]] })).toEqual({
      ok: false,
      issue: "parse-error",
    });
    expect(parseGeometry({ type: "Point", coordinates: [1, 2] })).toEqual({
      ok: false,
      issue: "unsupported-type",
    });
    expect(parseGeometry({ type: "Polygon", coordinates: [[]] })).toEqual({ ok: false, issue: "empty" });
  });

  it("drops a third (altitude) coordinate", () => {
    const result = parseGeometry({ type: "Polygon", coordinates: [[[-73.9, 40.7, 12]]] });
    expect(result).toEqual({ ok: true, geometry: { type: "Polygon", coordinates: [[[-73.9, 40.7]]] } });
  });
});

describe("anchorPoint", () => {
  it("uses the first vertex of the first ring", () => {
    expect(anchorPoint(polygon)).toEqual({ lat: 40.75, lon: -73.99 });
    expect(anchorPoint(multiPolygon)).toEqual({ lat: 40.7, lon: -73.95 });
  });

  it("returns null for missing or empty geometry", () => {
    expect(anchorPoint(null)).toBeNull();
    expect(anchorPoint({ type: "MultiPolygon", coordinates: [[[]]] })).toBeNull();
  });
});

describe("bounds", () => {
  it("visits every ring of every polygon", () => {
    expect(bounds(multiPolygon)).toEqual([-74.01, 40.69, -73.94, 40.72]);
  });

  it("returns a degenerate single-point ring as both min and max", () => {
    expect(bounds({ type: "Polygon", coordinates: [[[-73.9, 40.7]]] })).toEqual([-73.9, 40.7, -73.9, 40.7]);
  });

  it("returns null when there are no coordinates", () => {
    expect(bounds({ type: "Polygon", coordinates: [] })).toBeNull();
    expect(bounds(undefined)).toBeNull();
  });
});

describe("unionBounds", () => {
  it("returns null for an empty list or a list of nulls", () => {
    expect(unionBounds([])).toBeNull();
    expect(unionBounds([null, null])).toBeNull();
  });

  it("folds min/max componentwise and skips nulls", () => {
    expect(unionBounds([null, [0, 1, 2, 3], [-1, 2, 1, 5]])).toEqual([-1, 1, 2, 5]);
  });

  it("works over geometries", () => {
    expect(unionGeometryBounds([polygon, null, multiPolygon])).toEqual([-74.01, 40.69, -73.94, 40.76]);
  });
});

describe("zoomForSpan", () => {
  it("maps spans to the configured breakpoints", () => {
    expect(zoomForSpan(0.5)).toBe(10);
    expect(zoomForSpan(0.3)).toBe(11);
    expect(zoomForSpan(0.2)).toBe(11);
    expect(zoomForSpan(0.1)).toBe(12);
    expect(zoomForSpan(0.05)).toBe(13);
    expect(zoomForSpan(0.03)).toBe(14);
    expect(zoomForSpan(0.02)).toBe(15);
    expect(zoomForSpan(0)).toBe(15);
  });

  it("never zooms in as the span grows", () => {
    const spans = [0, 0.01, 0.02, 0.021, 0.04, 0.041, 0.08, 0.081, 0.15, 0.151, 0.3, 0.31, 5];
    const zooms = spans.map(zoomForSpan);
    for (let i = 1; i < zooms.length; i += 1) {
      expect(zooms[i]).toBeLessThanOrEqual(zooms[i - 1]);
    }
  });

  it("treats non-finite spans as the widest view", () => {
    expect(zoomForSpan(Number.NaN)).toBe(10);
    expect(zoomForSpan(Infinity)).toBe(10);
  });
});

describe("bboxCenter", () => {
  it("returns the midpoint", () => {
    expect(bboxCenter([-74, 40, -73, 41])).toEqual({ lat: 40.5, lon: -73.5 });
  });
});
