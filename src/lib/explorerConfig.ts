// Visual tuning for the explorer. Thresholds here are heuristics, not data contracts.

export const NYC_CENTER = {
  latitude: 40.7549,
  longitude: -73.984,
};

export const DEFAULT_ZOOM = 12;

/** Zoom used when the first load centers on the highest-impact parcel. */
export const OVERVIEW_ZOOM = 15;

/** Zoom used when a single parcel is selected from the map or list. */
export const CLOSE_UP_ZOOM = 16;

export const MIN_MAP_ZOOM = 10;
export const MAX_MAP_ZOOM = 16;

/**
 * Span (degrees) → zoom. The first entry whose span is strictly exceeded wins;
 * anything smaller falls through to FALLBACK_SPAN_ZOOM.
 */
export const ZOOM_BREAKPOINTS: ReadonlyArray<{ span: number; zoom: number }> = [
  { span: 0.3, zoom: 10 },
  { span: 0.15, zoom: 11 },
  { span: 0.08, zoom: 12 },
  { span: 0.04, zoom: 13 },
  { span: 0.02, zoom: 14 },
];
export const FALLBACK_SPAN_ZOOM = 15;

export const TOP_LIST_SIZE = 10;

/** Half-width (degrees) of the square used by "Update Top 10 from current map view". */
export const MAP_WINDOW_HALF_WIDTH = 0.02;

/** Impact percentages below this are drawn gray and don't count as "colored". */
export const DISPLAY_FLOOR_PERCENT = 1;
