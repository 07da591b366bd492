import type { BBox, GeometryIssue, LatLon, ParcelGeometry, Position, Ring } from "../types/parcel";
import { FALLBACK_SPAN_ZOOM, ZOOM_BREAKPOINTS } from "./explorerConfig";

export type GeometryResult =
  | { ok: true; geometry: ParcelGeometry }
  | { ok: false; issue: GeometryIssue };

const isPosition = (value: unknown): value is Position =>
  Array.isArray(value) &&
  value.length >= 2 &&
  typeof value[0] === "number" &&
  typeof value[1] === "number" &&
  Number.isFinite(value[0]) &&
  Number.isFinite(value[1]);

const toRing = (value: unknown): Ring | null => {
  if (!Array.isArray(value)) return null;
  const ring: Ring = [];
  for (const point of value) {
    if (!isPosition(point)) return null;
    ring.push([point[0], point[1]]);
  }
  return ring;
};

const toRings = (value: unknown): Ring[] | null => {
  if (!Array.isArray(value)) return null;
  const rings: Ring[] = [];
  for (const entry of value) {
    const ring = toRing(entry);
    if (!ring) return null;
    rings.push(ring);
  }
  return rings;
};

const toPolygons = (value: unknown): Ring[][] | null => {
  if (!Array.isArray(value)) return null;
  const polygons: Ring[][] = [];
  for (const entry of value) {
    const rings = toRings(entry);
    if (!rings) return null;
    polygons.push(rings);
  }
  return polygons;
};

const hasAnyPosition = (geometry: ParcelGeometry): boolean => {
  let found = false;
  visitPositions(geometry, () => {
    found = true;
  });
  return found;
};

/**
 * Parse a Polygon / MultiPolygon from a GeoJSON string or object.
 * Coordinates are expected in [lon, lat] order already (EPSG:4326).
 */
export const parseGeometry = (raw: unknown): GeometryResult => {
  if (raw === null || raw === undefined || raw === "") return { ok: false, issue: "missing" };

  let value: unknown = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch {
      return { ok: false, issue: "parse-error" };
    }
  }
  if (!value || typeof value !== "object") return { ok: false, issue: "parse-error" };

  const type = "type" in value ? value.type : undefined;
  const coordinates = "coordinates" in value ? value.coordinates : undefined;

  let geometry: ParcelGeometry;
  if (type === "Polygon") {
    const rings = toRings(coordinates);
    if (!rings) return { ok: false, issue: "parse-error" };
    geometry = { type: "Polygon", coordinates: rings };
  } else if (type === "MultiPolygon") {
    const polygons = toPolygons(coordinates);
    if (!polygons) return { ok: false, issue: "parse-error" };
    geometry = { type: "MultiPolygon", coordinates: polygons };
  } else {
    return { ok: false, issue: "unsupported-type" };
  }

  if (!hasAnyPosition(geometry)) return { ok: false, issue: "empty" };
  return { ok: true, geometry };
};

const polygonsOf = (geometry: ParcelGeometry): Ring[][] =>
  geometry.type === "Polygon" ? [geometry.coordinates] : geometry.coordinates;

export const visitPositions = (
  geometry: ParcelGeometry,
  visit: (position: Position) => void,
): void => {
  for (const polygon of polygonsOf(geometry)) {
    for (const ring of polygon) {
      for (const position of ring) {
        visit(position);
      }
    }
  }
};

/**
 * First vertex of the first ring. Cheap and stable; good enough to center the
 * camera on a tax lot, which is tiny at close-up zoom.
 */
export const anchorPoint = (geometry: ParcelGeometry | null | undefined): LatLon | null => {
  if (!geometry) return null;
  for (const polygon of polygonsOf(geometry)) {
    for (const ring of polygon) {
      const first = ring[0];
      if (first && isPosition(first)) {
        return { lat: first[1], lon: first[0] };
      }
    }
  }
  return null;
};

export const bounds = (geometry: ParcelGeometry | null | undefined): BBox | null => {
  if (!geometry) return null;
  let minLon = Infinity;
  let minLat = Infinity;
  let maxLon = -Infinity;
  let maxLat = -Infinity;
  let count = 0;
  visitPositions(geometry, ([lon, lat]) => {
    if (!Number.isFinite(lon) || !Number.isFinite(lat)) return;
    if (lon < minLon) minLon = lon;
    if (lat < minLat) minLat = lat;
    if (lon > maxLon) maxLon = lon;
    if (lat > maxLat) maxLat = lat;
    count += 1;
  });
  if (count === 0) return null;
  return [minLon, minLat, maxLon, maxLat];
};

export const unionBounds = (boxes: ReadonlyArray<BBox | null | undefined>): BBox | null => {
  let result: BBox | null = null;
  for (const box of boxes) {
    if (!box) continue;
    if (!result) {
      result = [box[0], box[1], box[2], box[3]];
      continue;
    }
    result = [
      Math.min(result[0], box[0]),
      Math.min(result[1], box[1]),
      Math.max(result[2], box[2]),
      Math.max(result[3], box[3]),
    ];
  }
  return result;
};

export const unionGeometryBounds = (
  geometries: ReadonlyArray<ParcelGeometry | null | undefined>,
): BBox | null => unionBounds(geometries.map((geometry) => bounds(geometry)));

export const zoomForSpan = (span: number): number => {
  // NaN / Infinity: show as much as possible
  if (!Number.isFinite(span)) return ZOOM_BREAKPOINTS[0]?.zoom ?? FALLBACK_SPAN_ZOOM;
  for (const breakpoint of ZOOM_BREAKPOINTS) {
    if (span > breakpoint.span) return breakpoint.zoom;
  }
  return FALLBACK_SPAN_ZOOM;
};

export const bboxCenter = (box: BBox): LatLon => ({
  lat: (box[1] + box[3]) / 2,
  lon: (box[0] + box[2]) / 2,
});
