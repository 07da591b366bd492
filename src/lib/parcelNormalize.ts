import type { GeometryIssue, Parcel, ParcelDetails } from "../types/parcel";
import { parseGeometry } from "./geometry";

export type RawParcelRow = Record<string, unknown>;

export const MISSING_ID = "N/A";

export const toNumber = (value: unknown): number | null => {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

export const toText = (value: unknown): string | null => {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
};

export function fieldOrDefault<T>(row: RawParcelRow, key: string, read: (value: unknown) => T | null): T | null;
export function fieldOrDefault<T>(row: RawParcelRow, key: string, read: (value: unknown) => T | null, fallback: T): T;
export function fieldOrDefault<T>(
  row: RawParcelRow,
  key: string,
  read: (value: unknown) => T | null,
  fallback: T | null = null,
): T | null {
  const value = read(row[key]);
  return value === null ? fallback : value;
}

const ZIP_PATTERN = /^(\d{1,5})(?:-\d{4})?$/;

/**
 * "1001" → "01001", 10001 → "10001", "10001.0" → "10001", "10001-1234" → "10001".
 * Anything else is treated as absent.
 */
export const normalizeZip5 = (value: unknown): string | null => {
  let text: string | null = null;
  if (typeof value === "number") {
    text = Number.isInteger(value) && value >= 0 ? String(value) : null;
  } else if (typeof value === "string") {
    text = value.trim().replace(/\.0+$/, "");
  }
  if (!text) return null;
  const match = ZIP_PATTERN.exec(text);
  if (!match) return null;
  return match[1].padStart(5, "0");
};

export const normalizeBoroughCode = (value: unknown): string | null => {
  const text = toText(value);
  return text ? text.toUpperCase() : null;
};

const readDetails = (row: RawParcelRow): ParcelDetails => ({
  newUnits: fieldOrDefault(row, "newUnits", toNumber, 0),
  newFloors: fieldOrDefault(row, "newFloors", toNumber),
  newBuildingHeight: fieldOrDefault(row, "newBuildingHeight", toNumber),
  airRights: fieldOrDefault(row, "airRights", toText),
  existingFloors: fieldOrDefault(row, "existingFloors", toNumber),
  residentialArea: fieldOrDefault(row, "residentialArea", toNumber),
  commercialArea: fieldOrDefault(row, "commercialArea", toNumber),
  unitsResidential: fieldOrDefault(row, "unitsResidential", toNumber),
  unitsCommercial: fieldOrDefault(row, "unitsCommercial", toNumber),
  unitsTotal: fieldOrDefault(row, "unitsTotal", toNumber),
  yearBuilt: fieldOrDefault(row, "yearBuilt", toNumber),
  farBuilt: fieldOrDefault(row, "farBuilt", toNumber),
  farResidential: fieldOrDefault(row, "farResidential", toNumber),
  farCommercial: fieldOrDefault(row, "farCommercial", toNumber),
  zoningDistrict: fieldOrDefault(row, "zoningDistrict", toText),
  buildingClass: fieldOrDefault(row, "buildingClass", toText),
  owner: fieldOrDefault(row, "owner", toText),
});

export const normalizeParcel = (row: RawParcelRow): Parcel | null => {
  const id = fieldOrDefault(row, "bbl", toText);
  if (!id || id === MISSING_ID) return null;

  const parsed = parseGeometry(row.geometry);

  return {
    id,
    address: fieldOrDefault(row, "address", toText),
    boroughCode: normalizeBoroughCode(row.borough),
    zip5: normalizeZip5(row.zipcode),
    impactRatio: fieldOrDefault(row, "impactRatio", toNumber),
    geometry: parsed.ok ? parsed.geometry : null,
    geometryIssue: parsed.ok ? null : parsed.issue,
    details: readDetails(row),
  };
};

export interface NormalizedParcels {
  parcels: Parcel[];
  skipped: number;
  geometryIssues: Partial<Record<GeometryIssue, number>>;
}

export const normalizeParcels = (rows: ReadonlyArray<RawParcelRow>): NormalizedParcels => {
  const parcels: Parcel[] = [];
  const seen = new Set<string>();
  const geometryIssues: Partial<Record<GeometryIssue, number>> = {};
  let skipped = 0;

  for (const row of rows) {
    const parcel = normalizeParcel(row);
    if (!parcel || seen.has(parcel.id)) {
      skipped += 1;
      continue;
    }
    seen.add(parcel.id);
    if (parcel.geometryIssue) {
      geometryIssues[parcel.geometryIssue] = (geometryIssues[parcel.geometryIssue] ?? 0) + 1;
    }
    parcels.push(parcel);
  }

  return { parcels, skipped, geometryIssues };
};
