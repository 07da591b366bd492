import { useCallback, useEffect, useState } from "react";
import { parcelStore } from "../../lib/parcelSource";
import type { ParcelSnapshot } from "../../state/parcels";

/** Subscribe to the shared parcel store; the first subscriber triggers the load. */
export const useParcels = () => {
  const [snapshot, setSnapshot] = useState<ParcelSnapshot>(() => parcelStore.getSnapshot());

  useEffect(() => parcelStore.subscribe(setSnapshot), []);

  const refresh = useCallback(() => {
    void parcelStore.refresh();
  }, []);

  return { ...snapshot, refresh };
};
