import type { Parcel } from "../types/parcel";
import { anchorPoint, bboxCenter, unionGeometryBounds, zoomForSpan } from "../lib/geometry";
import { CLOSE_UP_ZOOM, DEFAULT_ZOOM, NYC_CENTER, OVERVIEW_ZOOM } from "../lib/explorerConfig";

export interface ViewportState {
  lat: number;
  lon: number;
  zoom: number;
  /** False until something other than the initial default has positioned the map. */
  touched: boolean;
}

export const createViewportState = (): ViewportState => ({
  lat: NYC_CENTER.latitude,
  lon: NYC_CENTER.longitude,
  zoom: DEFAULT_ZOOM,
  touched: false,
});

const isFiniteNumber = (value: number): boolean => Number.isFinite(value);

export const focusOnPoint = (
  state: ViewportState,
  lat: number,
  lon: number,
  zoom: number,
): ViewportState => {
  if (!isFiniteNumber(lat) || !isFiniteNumber(lon) || !isFiniteNumber(zoom)) return state;
  return { lat, lon, zoom, touched: true };
};

export const focusOnParcel = (
  state: ViewportState,
  parcel: Pick<Parcel, "geometry">,
  zoom: number = CLOSE_UP_ZOOM,
): ViewportState => {
  const anchor = anchorPoint(parcel.geometry);
  if (!anchor) return state;
  return focusOnPoint(state, anchor.lat, anchor.lon, zoom);
};

const impactRank = (parcel: Parcel): number =>
  typeof parcel.impactRatio === "number" && Number.isFinite(parcel.impactRatio)
    ? parcel.impactRatio
    : -Infinity;

/**
 * One-shot auto focus for the first load: centers on the highest-impact parcel
 * that has geometry. Ignored once the viewport has been moved.
 */
export const focusOnHighestMetric = (
  state: ViewportState,
  parcels: ReadonlyArray<Parcel>,
): ViewportState => {
  if (state.touched) return state;

  let best: Parcel | null = null;
  for (const parcel of parcels) {
    if (!anchorPoint(parcel.geometry)) continue;
    if (!best || impactRank(parcel) > impactRank(best)) best = parcel;
  }
  if (!best) return state;
  return focusOnParcel(state, best, OVERVIEW_ZOOM);
};

export const focusOnBounds = (
  state: ViewportState,
  parcels: ReadonlyArray<Pick<Parcel, "geometry">>,
): ViewportState => {
  const box = unionGeometryBounds(parcels.map((parcel) => parcel.geometry));
  if (!box) return state;
  const center = bboxCenter(box);
  const zoom = zoomForSpan(Math.max(box[2] - box[0], box[3] - box[1]));
  return focusOnPoint(state, center.lat, center.lon, zoom);
};

export interface CameraPosition {
  lat: number;
  lon: number;
  zoom: number;
}

/**
 * Mirror the map camera after the user pans or zooms, so "update from current
 * view" windows around what is actually on screen.
 */
export const syncFromCamera = (state: ViewportState, camera: CameraPosition): ViewportState => {
  if (
    camera.lat === state.lat &&
    camera.lon === state.lon &&
    camera.zoom === state.zoom
  ) {
    return state;
  }
  return focusOnPoint(state, camera.lat, camera.lon, camera.zoom);
};
