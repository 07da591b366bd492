import { describe, it, expect } from "vitest";
import {
  createExplorerState,
  createMapParcelsSelector,
  explorerReducer,
  selectActiveParcels,
  selectRenderModel,
  type ExplorerState,
} from "./explorer";
import { makeParcel, squareAt } from "../lib/testing/parcelFactory";

const parcels = [
  makeParcel({ id: "1", boroughCode: "MN", zip5: "10019", impactRatio: 0.5, geometry: squareAt(-73.98, 40.76) }),
  makeParcel({ id: "2", boroughCode: "BK", zip5: "11201", impactRatio: 1.6, geometry: squareAt(-73.99, 40.69) }),
  makeParcel({ id: "3", boroughCode: "MN", zip5: "10019", impactRatio: 0.005, geometry: squareAt(-73.981, 40.761) }),
  makeParcel({ id: "4", boroughCode: "QN", zip5: "11101", impactRatio: null }),
];

const loaded = (): ExplorerState =>
  explorerReducer(createExplorerState(), { type: "parcelsLoaded", parcels });

const ids = (items: ReadonlyArray<{ id: string }>) => items.map((item) => item.id);

describe("explorerReducer", () => {
  it("focuses on the highest-impact parcel on first load", () => {
    const state = loaded();
    expect(state.viewport).toEqual({ lat: 40.69, lon: -73.99, zoom: 15, touched: true });
    expect(state.searchResult?.filtered).toBe(false);
    expect(ids(selectActiveParcels(parcels, state))).toEqual(["1", "2", "3", "4"]);
  });

  it("filters by ZIP and fits the viewport to the result", () => {
    const state = explorerReducer(loaded(), { type: "searchChanged", mode: "zip", query: "10019", parcels });
    expect(ids(selectActiveParcels(parcels, state))).toEqual(["1", "3"]);
    expect(state.viewport.zoom).toBe(15);
    expect(state.viewport.lat).toBeCloseTo(40.761, 9);
    expect(state.viewport.lon).toBeCloseTo(-73.98, 9);
  });

  it("returns the same state for a repeated search", () => {
    const state = explorerReducer(loaded(), { type: "searchChanged", mode: "zip", query: "10019", parcels });
    expect(explorerReducer(state, { type: "searchChanged", mode: "zip", query: "10019", parcels })).toBe(state);
  });

  it("leaves the viewport alone when a search matches nothing", () => {
    const before = loaded();
    const state = explorerReducer(before, { type: "searchChanged", mode: "address", query: "nowhere", parcels });
    expect(state.searchResult?.parcels).toEqual([]);
    expect(state.viewport).toBe(before.viewport);
  });

  it("lands map clicks and list locate on identical state", () => {
    const base = explorerReducer(loaded(), { type: "searchChanged", mode: "zip", query: "10019", parcels });
    const fromMap = explorerReducer(base, { type: "mapParcelClicked", id: "2", parcels });
    const fromList = explorerReducer(base, { type: "listLocateClicked", id: "2", parcels });
    expect(fromMap).toEqual(fromList);
    expect(fromMap.selection).toEqual({ selectedId: "2", viewMode: "single", useMapWindow: false });
    expect(fromMap.viewport).toEqual({ lat: 40.69, lon: -73.99, zoom: 16, touched: true });
  });

  it("records a miss without changing the selection", () => {
    const selected = explorerReducer(loaded(), { type: "mapParcelClicked", id: "1", parcels });
    const missed = explorerReducer(selected, { type: "listLocateClicked", id: "999", parcels });
    expect(missed.selection).toBe(selected.selection);
    expect(missed.viewport).toBe(selected.viewport);
    expect(missed.lastMiss).toBe("999");
  });

  it("clears the selection and miss on showTopList", () => {
    const missed = explorerReducer(
      explorerReducer(loaded(), { type: "mapParcelClicked", id: "1", parcels }),
      { type: "listLocateClicked", id: "999", parcels },
    );
    const state = explorerReducer(missed, { type: "showTopList" });
    expect(state.selection).toEqual({ selectedId: null, viewMode: "list", useMapWindow: false });
    expect(state.lastMiss).toBeNull();
  });

  it("ignores camera events that match the current viewport", () => {
    const state = loaded();
    const { lat, lon, zoom } = state.viewport;
    expect(explorerReducer(state, { type: "cameraMoved", camera: { lat, lon, zoom } })).toBe(state);
  });
});

describe("selectRenderModel", () => {
  it("ranks the list", () => {
    const model = selectRenderModel(parcels, loaded());
    expect(ids(model.list.parcels)).toEqual(["2", "1", "3", "4"]);
    expect(model.listCaption).toBe("Top 4 properties by % Impact");
    expect(model.notices).toEqual([]);
  });

  it("paints the selected parcel and shows only it in the list", () => {
    const state = explorerReducer(loaded(), { type: "mapParcelClicked", id: "1", parcels });
    const model = selectRenderModel(parcels, state);
    const mapParcels = createMapParcelsSelector()(parcels, state);
    expect(mapParcels.find(({ parcel }) => parcel.id === "1")?.color).toBe("selected");
    expect(model.list.mode).toBe("single");
    expect(ids(model.list.parcels)).toEqual(["1"]);
  });

  it("windows the list around the camera after recentering", () => {
    let state = explorerReducer(loaded(), { type: "recenterFromMap" });
    state = explorerReducer(state, { type: "cameraMoved", camera: { lat: 40.76, lon: -73.98, zoom: 14 } });
    const model = selectRenderModel(parcels, state);
    expect(model.list.mode).toBe("list");
    expect(ids(model.list.parcels)).toEqual(["1", "3"]);
    expect(model.listCaption).toBe("Top 2 properties by % Impact");
  });

  it("surfaces ZIP substitutions and selection misses as notices", () => {
    let state = explorerReducer(loaded(), { type: "searchChanged", mode: "zip", query: "10020", parcels });
    state = explorerReducer(state, { type: "mapParcelClicked", id: "999", parcels });
    expect(selectRenderModel(parcels, state).notices).toEqual([
      "10020 not found, using 10019",
      "Property 999 not found",
    ]);
  });

  it("reports a missed id once when it is also the stale selection", () => {
    const state: ExplorerState = {
      ...loaded(),
      selection: { selectedId: "gone", viewMode: "single", useMapWindow: false },
      lastMiss: "gone",
    };
    expect(selectRenderModel(parcels, state).notices).toEqual(["Property gone not found"]);
  });

  it("reports a selected id that is no longer in the parcel set", () => {
    const state: ExplorerState = {
      ...loaded(),
      selection: { selectedId: "gone", viewMode: "single", useMapWindow: false },
    };
    const model = selectRenderModel(parcels, state);
    expect(model.list.parcels).toEqual([]);
    expect(model.notices).toEqual(["Property gone not found"]);
  });
});

describe("createMapParcelsSelector", () => {
  it("colors every active parcel", () => {
    const mapParcels = createMapParcelsSelector()(parcels, loaded());
    expect(mapParcels.map(({ parcel, color }) => [parcel.id, color])).toEqual([
      ["1", "medium"],
      ["2", "extreme"],
      ["3", "none"],
      ["4", "none"],
    ]);
  });

  it("hands back the same array when only the camera moved", () => {
    const selectMapParcels = createMapParcelsSelector();
    const before = loaded();
    const after = explorerReducer(before, {
      type: "cameraMoved",
      camera: { lat: 40.8, lon: -73.95, zoom: 13 },
    });
    expect(after.viewport).not.toBe(before.viewport);
    expect(selectMapParcels(parcels, after)).toBe(selectMapParcels(parcels, before));
  });

  it("rebuilds when the selection or the active subset changes", () => {
    const selectMapParcels = createMapParcelsSelector();
    const base = loaded();
    const first = selectMapParcels(parcels, base);

    const selected = explorerReducer(base, { type: "mapParcelClicked", id: "3", parcels });
    const afterSelect = selectMapParcels(parcels, selected);
    expect(afterSelect).not.toBe(first);
    expect(afterSelect.find(({ parcel }) => parcel.id === "3")?.color).toBe("selected");

    const searched = explorerReducer(selected, { type: "searchChanged", mode: "borough", query: "bk", parcels });
    expect(selectMapParcels(parcels, searched).map(({ parcel }) => parcel.id)).toEqual(["2"]);
  });
});
