import type maplibregl from "maplibre-gl";
import type { ExpressionSpecification } from "@maplibre/maplibre-gl-style-spec";
import type { Feature, FeatureCollection, MultiPolygon, Polygon } from "geojson";

import type { ParcelRenderItem } from "../../../state/explorer";
import { IMPACT_COLORS, type ParcelColorCategory } from "../../../lib/impactColors";
import {
  NOT_AVAILABLE,
  formatBorough,
  formatDecimal,
  formatHeight,
  formatInt,
  formatPercentFromRatio,
  formatText,
} from "../../../lib/format";

export const PARCEL_SOURCE_ID = "parcels";
export const PARCEL_FILL_LAYER_ID = "parcels-fill";
export const PARCEL_LINE_LAYER_ID = "parcels-line";
export const PARCEL_SELECTED_LINE_LAYER_ID = "parcels-selected-line";

/** Everything the hover popup shows, preformatted for display. */
export interface ParcelFeatureProperties {
  id: string;
  color: ParcelColorCategory;
  address: string;
  borough: string;
  zip: string;
  impactLabel: string;
  newUnits: string;
  newFloors: string;
  newBuildingHeight: string;
  existingFloors: string;
  owner: string;
}

export type ParcelFeatureCollection = FeatureCollection<Polygon | MultiPolygon, ParcelFeatureProperties>;

export const emptyParcelCollection = (): ParcelFeatureCollection => ({
  type: "FeatureCollection",
  features: [],
});

/** Parcels without usable geometry stay in the list but are not drawn. */
export const buildParcelFeatureCollection = (
  items: ReadonlyArray<ParcelRenderItem>,
): ParcelFeatureCollection => {
  const features: Feature<Polygon | MultiPolygon, ParcelFeatureProperties>[] = [];
  for (const { parcel, color } of items) {
    if (!parcel.geometry) continue;
    features.push({
      type: "Feature",
      id: parcel.id,
      geometry: parcel.geometry,
      properties: {
        id: parcel.id,
        color,
        address: formatText(parcel.address),
        borough: formatBorough(parcel.boroughCode),
        zip: formatText(parcel.zip5),
        impactLabel: formatPercentFromRatio(parcel.impactRatio),
        newUnits: formatInt(parcel.details.newUnits),
        newFloors: formatDecimal(parcel.details.newFloors),
        newBuildingHeight: formatHeight(parcel.details.newBuildingHeight),
        existingFloors: formatDecimal(parcel.details.existingFloors),
        owner: formatText(parcel.details.owner),
      },
    });
  }
  return { type: "FeatureCollection", features };
};

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");

export const parcelPopupHtml = (properties: ParcelFeatureProperties): string => {
  const rows: Array<[string, string]> = [
    ["BBL", properties.id],
    ["% Impact", properties.impactLabel],
    ["New Units", properties.newUnits],
    ["New Floors", properties.newFloors],
    ["New Building Height", properties.newBuildingHeight],
    ["Existing Floors", properties.existingFloors],
    ["Owner", properties.owner],
  ];
  const place =
    properties.borough === NOT_AVAILABLE
      ? `NY ${escapeHtml(properties.zip)}`
      : `${escapeHtml(properties.borough)}, NY ${escapeHtml(properties.zip)}`;
  return [
    `<b>${escapeHtml(properties.address)}</b><br/>${place}<hr/>`,
    rows.map(([label, value]) => `<b>${label}:</b> ${escapeHtml(value)}`).join("<br/>"),
  ].join("");
};

const fillColorExpression = [
  "match",
  ["get", "color"],
  "selected",
  IMPACT_COLORS.selected.hex,
  "low",
  IMPACT_COLORS.low.hex,
  "medium",
  IMPACT_COLORS.medium.hex,
  "high",
  IMPACT_COLORS.high.hex,
  "veryHigh",
  IMPACT_COLORS.veryHigh.hex,
  "extreme",
  IMPACT_COLORS.extreme.hex,
  IMPACT_COLORS.none.hex,
] as ExpressionSpecification;

const selectedFilter = ["==", ["get", "color"], "selected"] as ExpressionSpecification;

export const ensureParcelLayers = (map: maplibregl.Map, data: ParcelFeatureCollection): void => {
  if (!map.getSource(PARCEL_SOURCE_ID)) {
    map.addSource(PARCEL_SOURCE_ID, { type: "geojson", data });
  }
  if (!map.getLayer(PARCEL_FILL_LAYER_ID)) {
    map.addLayer({
      id: PARCEL_FILL_LAYER_ID,
      type: "fill",
      source: PARCEL_SOURCE_ID,
      paint: {
        "fill-color": fillColorExpression,
        "fill-opacity": 0.8,
      },
    });
  }
  if (!map.getLayer(PARCEL_LINE_LAYER_ID)) {
    map.addLayer({
      id: PARCEL_LINE_LAYER_ID,
      type: "line",
      source: PARCEL_SOURCE_ID,
      paint: {
        "line-color": "rgba(255, 255, 255, 0.8)",
        "line-width": 1,
      },
    });
  }
  if (!map.getLayer(PARCEL_SELECTED_LINE_LAYER_ID)) {
    map.addLayer({
      id: PARCEL_SELECTED_LINE_LAYER_ID,
      type: "line",
      source: PARCEL_SOURCE_ID,
      filter: selectedFilter,
      paint: {
        "line-color": IMPACT_COLORS.selected.hex,
        "line-width": 3,
      },
    });
  }
};
