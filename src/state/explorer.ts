import type { Parcel, SearchMode } from "../types/parcel";
import { resolveSearch, type SearchResult } from "../lib/parcelSearch";
import { buildListView, type ListView } from "../lib/listRanker";
import { colorForParcel, type ParcelColorCategory } from "../lib/impactColors";
import {
  createViewportState,
  focusOnBounds,
  focusOnHighestMetric,
  syncFromCamera,
  type CameraPosition,
  type ViewportState,
} from "./viewport";
import {
  clearSelection,
  createSelectionState,
  recenterFromMap,
  selectById,
  type SelectionState,
} from "./selection";

export interface ExplorerState {
  searchMode: SearchMode;
  searchQuery: string;
  searchResult: SearchResult | null;
  viewport: ViewportState;
  selection: SelectionState;
  /** Id from the last selection attempt that didn't match any parcel. */
  lastMiss: string | null;
}

export type ExplorerAction =
  | { type: "parcelsLoaded"; parcels: ReadonlyArray<Parcel> }
  | { type: "searchChanged"; mode: SearchMode; query: string; parcels: ReadonlyArray<Parcel> }
  | { type: "mapParcelClicked"; id: string; parcels: ReadonlyArray<Parcel> }
  | { type: "listLocateClicked"; id: string; parcels: ReadonlyArray<Parcel> }
  | { type: "showTopList" }
  | { type: "recenterFromMap" }
  | { type: "cameraMoved"; camera: CameraPosition };

export const createExplorerState = (): ExplorerState => ({
  searchMode: "address",
  searchQuery: "",
  searchResult: null,
  viewport: createViewportState(),
  selection: createSelectionState(),
  lastMiss: null,
});

const applySearch = (
  state: ExplorerState,
  mode: SearchMode,
  query: string,
  parcels: ReadonlyArray<Parcel>,
): ExplorerState => {
  const searchResult = resolveSearch(mode, query, parcels);
  const viewport =
    searchResult.filtered && searchResult.parcels.length > 0
      ? focusOnBounds(state.viewport, searchResult.parcels)
      : state.viewport;
  return { ...state, searchMode: mode, searchQuery: query, searchResult, viewport };
};

const applySelect = (
  state: ExplorerState,
  id: string,
  parcels: ReadonlyArray<Parcel>,
): ExplorerState => {
  const outcome = selectById(state, parcels, id);
  if (!outcome.found) return { ...state, lastMiss: id };
  return { ...state, selection: outcome.selection, viewport: outcome.viewport, lastMiss: null };
};

export const explorerReducer = (state: ExplorerState, action: ExplorerAction): ExplorerState => {
  switch (action.type) {
    case "parcelsLoaded": {
      const focused = { ...state, viewport: focusOnHighestMetric(state.viewport, action.parcels) };
      return applySearch(focused, state.searchMode, state.searchQuery, action.parcels);
    }
    case "searchChanged":
      if (action.mode === state.searchMode && action.query === state.searchQuery && state.searchResult) {
        return state;
      }
      return applySearch(state, action.mode, action.query, action.parcels);
    // Both input paths share one transition.
    case "mapParcelClicked":
    case "listLocateClicked":
      return applySelect(state, action.id, action.parcels);
    case "showTopList":
      return { ...state, selection: clearSelection(state.selection), lastMiss: null };
    case "recenterFromMap":
      return { ...state, selection: recenterFromMap(state.selection), lastMiss: null };
    case "cameraMoved": {
      const viewport = syncFromCamera(state.viewport, action.camera);
      return viewport === state.viewport ? state : { ...state, viewport };
    }
  }
};

export interface ParcelRenderItem {
  parcel: Parcel;
  color: ParcelColorCategory;
}

export interface ExplorerRenderModel {
  list: ListView;
  listCaption: string;
  notices: string[];
}

export const selectActiveParcels = (
  parcels: ReadonlyArray<Parcel>,
  state: ExplorerState,
): ReadonlyArray<Parcel> => state.searchResult?.parcels ?? parcels;

const buildMapParcels = (
  active: ReadonlyArray<Parcel>,
  selectedId: string | null,
): ParcelRenderItem[] => active.map((parcel) => ({ parcel, color: colorForParcel(parcel, selectedId) }));

/**
 * Memoized map features. Only the active subset and the selected id feed the
 * colors, so camera moves hand back the previous array and the map source is
 * left alone.
 */
export const createMapParcelsSelector = () => {
  let lastActive: ReadonlyArray<Parcel> | null = null;
  let lastSelectedId: string | null = null;
  let lastItems: ParcelRenderItem[] = [];

  return (parcels: ReadonlyArray<Parcel>, state: ExplorerState): ParcelRenderItem[] => {
    const active = selectActiveParcels(parcels, state);
    const selectedId = state.selection.selectedId;
    if (active === lastActive && selectedId === lastSelectedId) return lastItems;
    lastActive = active;
    lastSelectedId = selectedId;
    lastItems = buildMapParcels(active, selectedId);
    return lastItems;
  };
};

export const selectRenderModel = (
  parcels: ReadonlyArray<Parcel>,
  state: ExplorerState,
): ExplorerRenderModel => {
  const selectedId = state.selection.selectedId;
  const list = buildListView({
    all: parcels,
    active: selectActiveParcels(parcels, state),
    selection: state.selection,
    viewport: state.viewport,
  });

  const notices = [...(state.searchResult?.notices ?? [])];
  if (state.lastMiss !== null) notices.push(`Property ${state.lastMiss} not found`);
  if (list.missingSelection && selectedId !== null && selectedId !== state.lastMiss) {
    notices.push(`Property ${selectedId} not found`);
  }

  return {
    list,
    listCaption: `Top ${list.parcels.length} properties by % Impact`,
    notices,
  };
};
