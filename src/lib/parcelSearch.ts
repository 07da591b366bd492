import type { Parcel, SearchMode } from "../types/parcel";
import { isBoroughCode } from "../types/parcel";
import { resolveZips, type ZipSubstitution } from "./zipFallback";

export interface SearchResult {
  parcels: Parcel[];
  notices: string[];
  /** Resolved ZIPs for a ZIP search, empty for the other modes. */
  zips: string[];
  substitutions: ZipSubstitution[];
  /** False when the query was blank and nothing was filtered. */
  filtered: boolean;
}

const TOKEN_SEPARATOR = /[,;\s]+/;
const ZIP_TOKEN = /^\d{1,5}$/;

export const splitQueryTokens = (query: string): string[] =>
  query
    .split(TOKEN_SEPARATOR)
    .map((token) => token.trim())
    .filter(Boolean);

/** Digit-only tokens up to five characters, zero-padded and de-duplicated. */
export const parseZipTokens = (query: string): string[] => {
  const zips: string[] = [];
  for (const token of splitQueryTokens(query)) {
    if (!ZIP_TOKEN.test(token)) continue;
    const zip = token.padStart(5, "0");
    if (!zips.includes(zip)) zips.push(zip);
  }
  return zips;
};

const unfiltered = (parcels: ReadonlyArray<Parcel>): SearchResult => ({
  parcels: [...parcels],
  notices: [],
  zips: [],
  substitutions: [],
  filtered: false,
});

const searchByAddress = (query: string, parcels: ReadonlyArray<Parcel>): Parcel[] => {
  const needle = query.toLowerCase();
  return parcels.filter((parcel) => (parcel.address ?? "").toLowerCase().includes(needle));
};

const searchByBorough = (query: string, parcels: ReadonlyArray<Parcel>): Parcel[] => {
  const tokens = Array.from(new Set(splitQueryTokens(query).map((token) => token.toUpperCase())));
  const exact = new Set<string>(tokens.filter(isBoroughCode));
  const partial = tokens.filter((token) => !isBoroughCode(token));

  return parcels.filter((parcel) => {
    const code = parcel.boroughCode?.toUpperCase();
    if (!code) return false;
    if (exact.has(code)) return true;
    return partial.some((token) => code.includes(token));
  });
};

export const resolveSearch = (
  mode: SearchMode,
  query: string,
  parcels: ReadonlyArray<Parcel>,
): SearchResult => {
  const trimmed = query.trim();
  if (!trimmed) return unfiltered(parcels);

  switch (mode) {
    case "address":
      return { ...unfiltered(parcels), parcels: searchByAddress(trimmed, parcels), filtered: true };
    case "borough":
      return { ...unfiltered(parcels), parcels: searchByBorough(trimmed, parcels), filtered: true };
    case "zip": {
      const requested = parseZipTokens(trimmed);
      if (requested.length === 0) {
        return { ...unfiltered(parcels), parcels: [], filtered: true };
      }
      const resolution = resolveZips(requested, parcels);
      const wanted = new Set(resolution.zips);
      return {
        parcels: parcels.filter((parcel) => parcel.zip5 !== null && wanted.has(parcel.zip5)),
        notices: resolution.notices,
        zips: resolution.zips,
        substitutions: resolution.substitutions,
        filtered: true,
      };
    }
  }
};
