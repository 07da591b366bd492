import type { ParcelGeometry } from "../../src/types/parcel";
import { parseGeometry } from "../../src/lib/geometry";
import { normalizeBoroughCode, normalizeZip5, toNumber, toText } from "../../src/lib/parcelNormalize";

/** Row shape written to the InstantDB `parcels` entity. */
export interface ParcelSeedRow {
  bbl: string;
  borough?: string;
  address?: string;
  zipcode?: string;
  impactRatio?: number;
  newUnits?: number;
  newFloors?: number;
  newBuildingHeight?: number;
  airRights?: string;
  existingFloors?: number;
  residentialArea?: number;
  commercialArea?: number;
  unitsResidential?: number;
  unitsCommercial?: number;
  unitsTotal?: number;
  yearBuilt?: number;
  farBuilt?: number;
  farResidential?: number;
  farCommercial?: number;
  zoningDistrict?: string;
  buildingClass?: string;
  owner?: string;
  geometry?: ParcelGeometry;
}

type NumericField =
  | "impactRatio"
  | "newUnits"
  | "newFloors"
  | "newBuildingHeight"
  | "existingFloors"
  | "residentialArea"
  | "commercialArea"
  | "unitsResidential"
  | "unitsCommercial"
  | "unitsTotal"
  | "yearBuilt"
  | "farBuilt"
  | "farResidential"
  | "farCommercial";

type TextField = "address" | "airRights" | "zoningDistrict" | "buildingClass" | "owner";

// Column names as exported from the merged PLUTO / air-rights table
const NUMERIC_COLUMNS: ReadonlyArray<[NumericField, string]> = [
  ["impactRatio", "% of New Units Impact"],
  ["newUnits", "New Units"],
  ["newFloors", "New Floors"],
  ["newBuildingHeight", "New Building Height"],
  ["existingFloors", "# of Floors"],
  ["residentialArea", "Residential Area"],
  ["commercialArea", "Commercial Area"],
  ["unitsResidential", "Units Residential"],
  ["unitsCommercial", "Units Commercial"],
  ["unitsTotal", "Units Total"],
  ["yearBuilt", "Year Built"],
  ["farBuilt", "FAR Built"],
  ["farResidential", "FAR Residential"],
  ["farCommercial", "FAR Commercial"],
];

const TEXT_COLUMNS: ReadonlyArray<[TextField, string]> = [
  ["address", "Address_x"],
  ["airRights", "Air Rights"],
  ["zoningDistrict", "ZoneDist1"],
  ["buildingClass", "BldgClass"],
  ["owner", "OwnerName"],
];

export interface SourceFeature {
  geometry?: unknown;
  properties?: Record<string, unknown> | null;
}

export const featureToSeedRow = (feature: SourceFeature): ParcelSeedRow | null => {
  const props = feature.properties ?? {};
  const bbl = toText(props["BBL_10"] ?? props["BBL"]);
  if (!bbl) return null;

  const row: ParcelSeedRow = { bbl };

  const borough = normalizeBoroughCode(props["Borough_x"] ?? props["Borough"]);
  if (borough) row.borough = borough;
  const zipcode = normalizeZip5(props["Zipcode"]);
  if (zipcode) row.zipcode = zipcode;

  for (const [field, column] of NUMERIC_COLUMNS) {
    const value = toNumber(props[column]);
    if (value !== null) row[field] = value;
  }
  for (const [field, column] of TEXT_COLUMNS) {
    const value = toText(props[column]);
    if (value !== null) row[field] = value;
  }

  const parsed = parseGeometry(feature.geometry ?? props["geom_geojson"]);
  if (parsed.ok) row.geometry = parsed.geometry;

  return row;
};
