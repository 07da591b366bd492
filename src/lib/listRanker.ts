import type { LatLon, Parcel } from "../types/parcel";
import type { SelectionState } from "../state/selection";
import type { ViewportState } from "../state/viewport";
import { anchorPoint } from "./geometry";
import { MAP_WINDOW_HALF_WIDTH, TOP_LIST_SIZE } from "./explorerConfig";

export type ParcelMetric = (parcel: Parcel) => number | null;

export const impactMetric: ParcelMetric = (parcel) => parcel.impactRatio;

// Absent sorts below every real value, including 0 and negatives.
const metricValue = (metric: ParcelMetric, parcel: Parcel): number => {
  const value = metric(parcel);
  return typeof value === "number" && Number.isFinite(value) ? value : -Infinity;
};

export const rankParcels = (
  parcels: ReadonlyArray<Parcel>,
  n: number,
  metric: ParcelMetric = impactMetric,
): Parcel[] => {
  const limit = Math.max(0, Math.floor(n));
  // Array.prototype.sort is stable, so equal metrics keep input order
  return parcels
    .map((parcel) => ({ parcel, value: metricValue(metric, parcel) }))
    .sort((a, b) => (a.value === b.value ? 0 : a.value > b.value ? -1 : 1))
    .slice(0, limit)
    .map((entry) => entry.parcel);
};

export const windowAroundCenter = (
  parcels: ReadonlyArray<Parcel>,
  center: LatLon,
  halfWidth: number = MAP_WINDOW_HALF_WIDTH,
): Parcel[] =>
  parcels.filter((parcel) => {
    const anchor = anchorPoint(parcel.geometry);
    if (!anchor) return false;
    return (
      anchor.lat >= center.lat - halfWidth &&
      anchor.lat <= center.lat + halfWidth &&
      anchor.lon >= center.lon - halfWidth &&
      anchor.lon <= center.lon + halfWidth
    );
  });

export interface ListView {
  parcels: Parcel[];
  mode: SelectionState["viewMode"];
  /** Single view was requested for an id that isn't in the parcel set. */
  missingSelection: boolean;
}

export interface ListViewInput {
  all: ReadonlyArray<Parcel>;
  active: ReadonlyArray<Parcel>;
  selection: SelectionState;
  viewport: Pick<ViewportState, "lat" | "lon">;
  size?: number;
}

export const buildListView = ({
  all,
  active,
  selection,
  viewport,
  size = TOP_LIST_SIZE,
}: ListViewInput): ListView => {
  if (selection.viewMode === "single" && selection.selectedId !== null) {
    const selectedId = selection.selectedId;
    const match = all.filter((parcel) => parcel.id === selectedId);
    return {
      parcels: rankParcels(match, 1),
      mode: "single",
      missingSelection: match.length === 0,
    };
  }

  const candidates = selection.useMapWindow
    ? windowAroundCenter(active, { lat: viewport.lat, lon: viewport.lon })
    : active;

  return {
    parcels: rankParcels(candidates, size),
    mode: "list",
    missingSelection: false,
  };
};
