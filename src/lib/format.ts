/**
 * Display formatting for parcel attributes. Absent values render as "N/A".
 */
import { BOROUGH_NAMES, isBoroughCode } from "../types/parcel";

export const NOT_AVAILABLE = "N/A";

const isFiniteNumber = (value: number | null | undefined): value is number =>
  typeof value === "number" && Number.isFinite(value);

export const formatInt = (value: number | null | undefined): string => {
  if (!isFiniteNumber(value)) return NOT_AVAILABLE;
  return Math.round(value).toLocaleString("en-US");
};

export const formatHeight = (value: number | null | undefined): string => {
  if (!isFiniteNumber(value)) return NOT_AVAILABLE;
  return `${Math.round(value)} ft`;
};

export const formatAreaSqft = (value: number | null | undefined): string => {
  if (!isFiniteNumber(value)) return NOT_AVAILABLE;
  return `${Math.round(value).toLocaleString("en-US")} sq ft`;
};

// Ratios are stored as fractions: 0.92 → "92%"
export const formatPercentFromRatio = (ratio: number | null | undefined): string => {
  if (!isFiniteNumber(ratio)) return NOT_AVAILABLE;
  return `${Math.round(ratio * 100)}%`;
};

// Two decimals at most, trailing zeros dropped: 2.50 → "2.5", 3.00 → "3"
export const formatDecimal = (value: number | null | undefined): string => {
  if (!isFiniteNumber(value)) return NOT_AVAILABLE;
  const fixed = value.toFixed(2);
  return fixed.replace(/0+$/, "").replace(/\.$/, "");
};

export const formatText = (value: string | null | undefined): string =>
  value && value.trim() ? value : NOT_AVAILABLE;

// "MN" → "Manhattan"; unrecognized codes pass through as stored.
export const formatBorough = (code: string | null | undefined): string => {
  if (!code || !code.trim()) return NOT_AVAILABLE;
  return isBoroughCode(code) ? BOROUGH_NAMES[code] : code;
};
