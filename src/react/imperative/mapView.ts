import maplibregl from "maplibre-gl";

import type { ParcelRenderItem } from "../../state/explorer";
import type { CameraPosition } from "../../state/viewport";
import { MAX_MAP_ZOOM, MIN_MAP_ZOOM } from "../../lib/explorerConfig";
import {
  PARCEL_FILL_LAYER_ID,
  PARCEL_SOURCE_ID,
  buildParcelFeatureCollection,
  emptyParcelCollection,
  ensureParcelLayers,
  parcelPopupHtml,
  type ParcelFeatureCollection,
  type ParcelFeatureProperties,
} from "./layers/parcels";

interface MapViewOptions {
  initialCamera: CameraPosition;
  onParcelClick?: (parcelId: string) => void;
  /** Fired after a user pan/zoom settles; programmatic camera moves are not reported. */
  onCameraChange?: (camera: CameraPosition) => void;
}

export interface MapViewController {
  setParcels: (items: ReadonlyArray<ParcelRenderItem>) => void;
  setCamera: (camera: CameraPosition) => void;
  destroy: () => void;
}

const MAP_STYLE = "https://basemaps.cartocdn.com/gl/positron-gl-style/style.json";

const readString = (properties: Record<string, unknown> | null | undefined, key: string): string | null => {
  const value = properties?.[key];
  return typeof value === "string" ? value : null;
};

export const createMapView = (container: HTMLElement, options: MapViewOptions): MapViewController => {
  const { initialCamera, onParcelClick, onCameraChange } = options;
  const destroyFns: Array<() => void> = [];

  const map = new maplibregl.Map({
    container,
    style: MAP_STYLE,
    center: [initialCamera.lon, initialCamera.lat],
    zoom: initialCamera.zoom,
    minZoom: MIN_MAP_ZOOM - 2,
    maxZoom: MAX_MAP_ZOOM + 3,
    attributionControl: false,
    fadeDuration: 0,
    boxZoom: false,
  });

  map.dragRotate.disable();
  map.touchZoomRotate.disableRotation();
  map.addControl(new maplibregl.NavigationControl({ showCompass: false }), "top-right");

  let lastData: ParcelFeatureCollection = emptyParcelCollection();
  // Popup content comes from here rather than from the untyped rendered feature
  let propertiesById = new Map<string, ParcelFeatureProperties>();
  let styleReady = false;

  const syncSource = () => {
    const source = map.getSource(PARCEL_SOURCE_ID);
    if (source instanceof maplibregl.GeoJSONSource) {
      source.setData(lastData);
    }
  };

  const onStyleLoad = () => {
    styleReady = true;
    ensureParcelLayers(map, lastData);
    syncSource();
  };
  map.on("load", onStyleLoad);
  destroyFns.push(() => map.off("load", onStyleLoad));

  const popup = new maplibregl.Popup({ closeButton: false, closeOnClick: false, offset: 8 });

  const onFillMouseMove = (event: maplibregl.MapLayerMouseEvent) => {
    const parcelId = readString(event.features?.[0]?.properties, "id");
    const properties = parcelId ? propertiesById.get(parcelId) : undefined;
    if (!properties) {
      popup.remove();
      return;
    }
    map.getCanvas().style.cursor = "pointer";
    popup.setLngLat(event.lngLat).setHTML(parcelPopupHtml(properties)).addTo(map);
  };
  const onFillMouseLeave = () => {
    map.getCanvas().style.cursor = "";
    popup.remove();
  };
  const onFillClick = (event: maplibregl.MapLayerMouseEvent) => {
    const parcelId = readString(event.features?.[0]?.properties, "id");
    if (parcelId) onParcelClick?.(parcelId);
  };
  map.on("mousemove", PARCEL_FILL_LAYER_ID, onFillMouseMove);
  map.on("mouseleave", PARCEL_FILL_LAYER_ID, onFillMouseLeave);
  map.on("click", PARCEL_FILL_LAYER_ID, onFillClick);
  destroyFns.push(() => {
    map.off("mousemove", PARCEL_FILL_LAYER_ID, onFillMouseMove);
    map.off("mouseleave", PARCEL_FILL_LAYER_ID, onFillMouseLeave);
    map.off("click", PARCEL_FILL_LAYER_ID, onFillClick);
  });

  // Only user gestures carry an originalEvent; jumpTo() from setCamera doesn't.
  const onMoveEnd = (event: maplibregl.MapLibreEvent<MouseEvent | TouchEvent | WheelEvent | undefined>) => {
    if (!event.originalEvent) return;
    const center = map.getCenter();
    onCameraChange?.({ lat: center.lat, lon: center.lng, zoom: map.getZoom() });
  };
  map.on("moveend", onMoveEnd);
  destroyFns.push(() => map.off("moveend", onMoveEnd));

  const resizeObserver = new ResizeObserver(() => {
    map.resize();
  });
  resizeObserver.observe(container);

  return {
    setParcels: (items) => {
      lastData = buildParcelFeatureCollection(items);
      propertiesById = new Map(
        lastData.features.map((feature): [string, ParcelFeatureProperties] => [
          feature.properties.id,
          feature.properties,
        ]),
      );
      if (styleReady) syncSource();
    },
    setCamera: ({ lat, lon, zoom }) => {
      const center = map.getCenter();
      if (center.lat === lat && center.lng === lon && map.getZoom() === zoom) return;
      map.jumpTo({ center: [lon, lat], zoom });
    },
    destroy: () => {
      while (destroyFns.length) {
        const fn = destroyFns.pop();
        fn?.();
      }
      resizeObserver.disconnect();
      popup.remove();
      map.remove();
    },
  };
};
