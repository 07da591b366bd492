import { useCallback, useEffect, useMemo, useReducer } from "react";
import type { Parcel, SearchMode } from "../../types/parcel";
import type { CameraPosition } from "../../state/viewport";
import {
  createExplorerState,
  createMapParcelsSelector,
  explorerReducer,
  selectRenderModel,
} from "../../state/explorer";

/**
 * Owns the long-lived explorer state for the page and exposes one callback per
 * user interaction. Every callback is a single reducer pass.
 */
export const useExplorer = (parcels: ReadonlyArray<Parcel>) => {
  const [state, dispatch] = useReducer(explorerReducer, undefined, createExplorerState);

  useEffect(() => {
    if (parcels.length === 0) return;
    dispatch({ type: "parcelsLoaded", parcels });
  }, [parcels]);

  const search = useCallback(
    (mode: SearchMode, query: string) => dispatch({ type: "searchChanged", mode, query, parcels }),
    [parcels],
  );
  const onMapParcelClick = useCallback(
    (id: string) => dispatch({ type: "mapParcelClicked", id, parcels }),
    [parcels],
  );
  const onListLocate = useCallback(
    (id: string) => dispatch({ type: "listLocateClicked", id, parcels }),
    [parcels],
  );
  const showTopList = useCallback(() => dispatch({ type: "showTopList" }), []);
  const recenterFromMap = useCallback(() => dispatch({ type: "recenterFromMap" }), []);
  const onCameraChange = useCallback(
    (camera: CameraPosition) => dispatch({ type: "cameraMoved", camera }),
    [],
  );

  const model = useMemo(() => selectRenderModel(parcels, state), [parcels, state]);
  const selectMapParcels = useMemo(() => createMapParcelsSelector(), []);
  const mapParcels = selectMapParcels(parcels, state);

  return {
    state,
    model,
    mapParcels,
    search,
    onMapParcelClick,
    onListLocate,
    showTopList,
    recenterFromMap,
    onCameraChange,
  };
};
