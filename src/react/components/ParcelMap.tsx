import { useEffect, useRef } from "react";
import type { ParcelRenderItem } from "../../state/explorer";
import type { CameraPosition } from "../../state/viewport";
import { createMapView, type MapViewController } from "../imperative/mapView";

interface ParcelMapProps {
  parcels: ReadonlyArray<ParcelRenderItem>;
  camera: CameraPosition;
  onParcelClick: (parcelId: string) => void;
  onCameraChange: (camera: CameraPosition) => void;
}

/**
 * Thin React wrapper around the imperative MapLibre setup. The map is created
 * once; parcels and camera are pushed into it whenever they change.
 */
export const ParcelMap = ({ parcels, camera, onParcelClick, onCameraChange }: ParcelMapProps) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const controllerRef = useRef<MapViewController | null>(null);
  const initialCameraRef = useRef(camera);

  // Use refs for callbacks so the map doesn't need to be rebuilt when they change
  const onParcelClickRef = useRef(onParcelClick);
  const onCameraChangeRef = useRef(onCameraChange);
  useEffect(() => { onParcelClickRef.current = onParcelClick; }, [onParcelClick]);
  useEffect(() => { onCameraChangeRef.current = onCameraChange; }, [onCameraChange]);

  useEffect(() => {
    if (!containerRef.current) return;
    const controller = createMapView(containerRef.current, {
      initialCamera: initialCameraRef.current,
      onParcelClick: (id) => onParcelClickRef.current(id),
      onCameraChange: (next) => onCameraChangeRef.current(next),
    });
    controllerRef.current = controller;
    return () => {
      controller.destroy();
      controllerRef.current = null;
    };
  }, []);

  useEffect(() => {
    controllerRef.current?.setParcels(parcels);
  }, [parcels]);

  useEffect(() => {
    controllerRef.current?.setCamera({ lat: camera.lat, lon: camera.lon, zoom: camera.zoom });
  }, [camera.lat, camera.lon, camera.zoom]);

  return <div ref={containerRef} className="h-full w-full" />;
};
