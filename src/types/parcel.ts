export type Position = [number, number];
export type Ring = Position[];

export type ParcelGeometry =
  | { type: "Polygon"; coordinates: Ring[] }
  | { type: "MultiPolygon"; coordinates: Ring[][] };

export type GeometryIssue = "missing" | "parse-error" | "unsupported-type" | "empty";

/** [minLon, minLat, maxLon, maxLat] */
export type BBox = [number, number, number, number];

export interface LatLon {
  lat: number;
  lon: number;
}

export const BOROUGH_CODES = ["MN", "BX", "BK", "QN", "SI"] as const;
export type BoroughCode = (typeof BOROUGH_CODES)[number];

export const BOROUGH_NAMES: Record<BoroughCode, string> = {
  MN: "Manhattan",
  BX: "Bronx",
  BK: "Brooklyn",
  QN: "Queens",
  SI: "Staten Island",
};

export const isBoroughCode = (value: string): value is BoroughCode =>
  BOROUGH_CODES.some((code) => code === value);

// Descriptive columns carried from the lot dataset; the explorer only displays them.
export interface ParcelDetails {
  newUnits: number;
  newFloors: number | null;
  newBuildingHeight: number | null;
  airRights: string | null;
  existingFloors: number | null;
  residentialArea: number | null;
  commercialArea: number | null;
  unitsResidential: number | null;
  unitsCommercial: number | null;
  unitsTotal: number | null;
  yearBuilt: number | null;
  farBuilt: number | null;
  farResidential: number | null;
  farCommercial: number | null;
  zoningDistrict: string | null;
  buildingClass: string | null;
  owner: string | null;
}

export interface Parcel {
  /** BBL */
  id: string;
  address: string | null;
  boroughCode: string | null;
  zip5: string | null;
  impactRatio: number | null;
  geometry: ParcelGeometry | null;
  geometryIssue: GeometryIssue | null;
  details: ParcelDetails;
}

export type SearchMode = "address" | "zip" | "borough";

export const SEARCH_MODE_LABELS: Record<SearchMode, string> = {
  address: "Address",
  zip: "ZIP Code(s)",
  borough: "Borough",
};
