import { db } from "./reactDb";
import type { RawParcelRow } from "./parcelNormalize";
import { createParcelStore, DataSourceUnavailableError } from "../state/parcels";

const PARCELS_QUERY = {
  parcels: {},
};

export const loadParcelRows = async (): Promise<RawParcelRow[]> => {
  try {
    const { data } = await db.queryOnce(PARCELS_QUERY);
    const rows = data?.parcels ?? [];
    return rows.map((row): RawParcelRow => ({ ...row }));
  } catch (error) {
    throw new DataSourceUnavailableError("Could not reach the parcel database", { cause: error });
  }
};

export const parcelStore = createParcelStore(loadParcelRows);
