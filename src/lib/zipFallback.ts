import type { Parcel } from "../types/parcel";
import { hasImpactSignal } from "./impactColors";

export type ZipSubstitutionKind = "not-found" | "no-signal";

export interface ZipSubstitution {
  kind: ZipSubstitutionKind;
  requested: string;
  resolved: string;
}

export interface ZipResolution {
  zips: string[];
  substitutions: ZipSubstitution[];
  notices: string[];
}

export interface ZipIndex {
  available: Set<string>;
  colored: Set<string>;
}

export const buildZipIndex = (parcels: ReadonlyArray<Parcel>): ZipIndex => {
  const available = new Set<string>();
  const colored = new Set<string>();
  for (const parcel of parcels) {
    if (!parcel.zip5) continue;
    available.add(parcel.zip5);
    if (hasImpactSignal(parcel)) colored.add(parcel.zip5);
  }
  return { available, colored };
};

/**
 * Candidate with the smallest numeric distance to `zip`; ties go to the lower
 * ZIP. Returns null when there are no candidates.
 */
export const nearestZip = (zip: string, candidates: Iterable<string>): string | null => {
  const target = Number.parseInt(zip, 10);
  if (!Number.isFinite(target)) return null;

  let best: string | null = null;
  let bestDistance = Infinity;
  let bestValue = Infinity;
  for (const candidate of candidates) {
    const value = Number.parseInt(candidate, 10);
    if (!Number.isFinite(value)) continue;
    const distance = Math.abs(value - target);
    if (distance < bestDistance || (distance === bestDistance && value < bestValue)) {
      best = candidate;
      bestDistance = distance;
      bestValue = value;
    }
  }
  return best;
};

export const describeSubstitution = (substitution: ZipSubstitution): string =>
  substitution.kind === "not-found"
    ? `${substitution.requested} not found, using ${substitution.resolved}`
    : `${substitution.requested} has no colored properties, using ${substitution.resolved}`;

export const resolveZip = (
  zip: string,
  index: ZipIndex,
): { zip: string; substitutions: ZipSubstitution[] } => {
  const substitutions: ZipSubstitution[] = [];
  let resolved = zip;

  if (!index.available.has(resolved)) {
    const nearest = nearestZip(resolved, index.available);
    if (nearest !== null) {
      substitutions.push({ kind: "not-found", requested: resolved, resolved: nearest });
      resolved = nearest;
    }
  }

  if (!index.colored.has(resolved)) {
    const nearest = nearestZip(resolved, index.colored);
    if (nearest !== null) {
      substitutions.push({ kind: "no-signal", requested: resolved, resolved: nearest });
      resolved = nearest;
    }
  }

  return { zip: resolved, substitutions };
};

export const resolveZips = (
  requested: ReadonlyArray<string>,
  parcels: ReadonlyArray<Parcel>,
  index: ZipIndex = buildZipIndex(parcels),
): ZipResolution => {
  const zips: string[] = [];
  const substitutions: ZipSubstitution[] = [];
  const seenRequested = new Set<string>();
  const seenResolved = new Set<string>();
  const seenNotices = new Set<string>();

  for (const zip of requested) {
    if (seenRequested.has(zip)) continue;
    seenRequested.add(zip);

    const result = resolveZip(zip, index);
    // Tokens routed through the same intermediate ZIP share its signal-stage step.
    for (const substitution of result.substitutions) {
      const notice = describeSubstitution(substitution);
      if (seenNotices.has(notice)) continue;
      seenNotices.add(notice);
      substitutions.push(substitution);
    }
    if (!seenResolved.has(result.zip)) {
      seenResolved.add(result.zip);
      zips.push(result.zip);
    }
  }

  return { zips, substitutions, notices: substitutions.map(describeSubstitution) };
};
