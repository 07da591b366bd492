import type { Parcel } from "../types/parcel";
import { MISSING_ID } from "../lib/parcelNormalize";
import { focusOnParcel, type ViewportState } from "./viewport";

export type ViewMode = "list" | "single";

export interface SelectionState {
  selectedId: string | null;
  viewMode: ViewMode;
  /** "Update Top 10 from current map view": window the list around the viewport center. */
  useMapWindow: boolean;
}

export interface SelectionContext {
  selection: SelectionState;
  viewport: ViewportState;
}

export type SelectOutcome = SelectionContext & { found: boolean };

export const createSelectionState = (): SelectionState => ({
  selectedId: null,
  viewMode: "list",
  useMapWindow: false,
});

const isSelectableId = (id: string | null | undefined): id is string =>
  typeof id === "string" && id.trim().length > 0 && id !== MISSING_ID;

/**
 * Single entry point for selecting a parcel. Map clicks and list "locate"
 * buttons both land here so they leave identical state behind.
 */
export const selectParcel = (
  context: SelectionContext,
  parcel: Pick<Parcel, "id" | "geometry">,
): SelectionContext => {
  if (!isSelectableId(parcel.id)) return context;
  return {
    selection: { selectedId: parcel.id, viewMode: "single", useMapWindow: false },
    viewport: focusOnParcel(context.viewport, parcel),
  };
};

/** Look the id up in the full parcel set; a miss leaves state untouched. */
export const selectById = (
  context: SelectionContext,
  parcels: ReadonlyArray<Parcel>,
  id: string | null | undefined,
): SelectOutcome => {
  if (!isSelectableId(id)) return { ...context, found: false };
  const parcel = parcels.find((candidate) => candidate.id === id);
  if (!parcel) return { ...context, found: false };
  return { ...selectParcel(context, parcel), found: true };
};

export const clearSelection = (selection: SelectionState): SelectionState => {
  if (selection.viewMode === "list" && selection.selectedId === null && !selection.useMapWindow) {
    return selection;
  }
  return { selectedId: null, viewMode: "list", useMapWindow: false };
};

export const recenterFromMap = (selection: SelectionState): SelectionState => ({
  ...selection,
  viewMode: "list",
  useMapWindow: true,
});
