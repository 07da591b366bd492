/**
 * Load-once store for the parcel set. The first subscriber triggers the load;
 * later subscribers get the cached snapshot. `refresh()` is the only way to
 * reload.
 */
import type { Parcel } from "../types/parcel";
import { normalizeParcels, type RawParcelRow } from "../lib/parcelNormalize";

export class DataSourceUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DataSourceUnavailableError";
  }
}

export type ParcelLoader = () => Promise<ReadonlyArray<RawParcelRow>>;

export type ParcelSnapshot =
  | { status: "idle"; parcels: ReadonlyArray<Parcel>; error: null }
  | { status: "loading"; parcels: ReadonlyArray<Parcel>; error: null }
  | { status: "ready"; parcels: ReadonlyArray<Parcel>; error: null }
  | { status: "error"; parcels: ReadonlyArray<Parcel>; error: DataSourceUnavailableError };

type Listener = (snapshot: ParcelSnapshot) => void;

const EMPTY: ReadonlyArray<Parcel> = Object.freeze([]);

export class ParcelStore {
  private listeners = new Set<Listener>();
  private snapshot: ParcelSnapshot = { status: "idle", parcels: EMPTY, error: null };
  private inflight: Promise<void> | null = null;

  constructor(private readonly loader: ParcelLoader) {}

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    listener(this.snapshot);
    if (this.snapshot.status === "idle") void this.load();
    return () => {
      this.listeners.delete(listener);
    };
  }

  getSnapshot(): ParcelSnapshot {
    return this.snapshot;
  }

  refresh(): Promise<void> {
    this.inflight = null;
    return this.load({ force: true });
  }

  /**
   * Settles once the current load finishes. Never rejects: failures land in the
   * snapshot as `status: "error"`.
   */
  load({ force = false }: { force?: boolean } = {}): Promise<void> {
    if (this.inflight) return this.inflight;
    if (!force && this.snapshot.status === "ready") return Promise.resolve();

    this.setSnapshot({ status: "loading", parcels: this.snapshot.parcels, error: null });
    const request = this.fetchParcels()
      .then((parcels) => {
        this.setSnapshot({ status: "ready", parcels, error: null });
      })
      .catch((error: unknown) => {
        const failure =
          error instanceof DataSourceUnavailableError
            ? error
            : new DataSourceUnavailableError("Failed to load parcels", { cause: error });
        console.error("[parcels] Load failed", failure);
        this.setSnapshot({ status: "error", parcels: EMPTY, error: failure });
      })
      .finally(() => {
        if (this.inflight === request) this.inflight = null;
      });
    this.inflight = request;
    return request;
  }

  private async fetchParcels(): Promise<ReadonlyArray<Parcel>> {
    const rows = await this.loader();
    const { parcels, skipped, geometryIssues } = normalizeParcels(rows);
    if (parcels.length === 0) {
      throw new DataSourceUnavailableError(
        rows.length === 0 ? "Parcel source returned no rows" : "Parcel source returned no usable rows",
      );
    }
    if (skipped > 0) {
      console.warn(`[parcels] Skipped ${skipped} rows without a usable BBL`);
    }
    const issueCount = Object.values(geometryIssues).reduce((sum, count) => sum + (count ?? 0), 0);
    if (issueCount > 0) {
      console.warn(`[parcels] ${issueCount} parcels have no usable geometry`, geometryIssues);
    }
    console.info(`[parcels] Loaded ${parcels.length} parcels`);
    return Object.freeze(parcels);
  }

  private setSnapshot(next: ParcelSnapshot) {
    this.snapshot = next;
    this.listeners.forEach((listener) => listener(next));
  }
}

export const createParcelStore = (loader: ParcelLoader): ParcelStore => new ParcelStore(loader);
