import { ArrowPathIcon } from "@heroicons/react/24/outline";
import { useParcels } from "./hooks/useParcels";
import { useExplorer } from "./hooks/useExplorer";
import { ParcelMap } from "./components/ParcelMap";
import { PropertyList } from "./components/PropertyList";
import { SearchBar } from "./components/SearchBar";
import { ImpactLegend } from "./components/ImpactLegend";

export const ExplorerApp = () => {
  const { status, parcels, error, refresh } = useParcels();
  const explorer = useExplorer(parcels);
  const { state, model } = explorer;

  if (status === "error") {
    return (
      <div className="flex h-screen flex-col items-center justify-center gap-3 text-sm text-slate-600 dark:text-slate-300">
        <p className="font-semibold">Property data is unavailable.</p>
        <p className="text-xs text-slate-400">{error.message}</p>
        <button
          type="button"
          onClick={refresh}
          className="rounded-md border border-slate-200 px-3 py-1 hover:bg-slate-100 dark:border-slate-700 dark:hover:bg-slate-800"
        >
          Try again
        </button>
      </div>
    );
  }

  if (status !== "ready") {
    return (
      <div className="flex h-screen items-center justify-center text-sm text-slate-500">Loading properties…</div>
    );
  }

  return (
    <div className="flex h-screen flex-col bg-slate-50 text-slate-900 dark:bg-slate-950 dark:text-slate-100">
      <header className="flex items-center justify-between border-b border-slate-200 px-4 py-2 dark:border-slate-800">
        <h1 className="text-xl font-semibold">NYC Air Rights Explorer</h1>
        <button
          type="button"
          onClick={refresh}
          title="Reload property data"
          className="flex h-8 w-8 items-center justify-center rounded-md text-slate-500 hover:bg-slate-100 dark:hover:bg-slate-800"
        >
          <ArrowPathIcon className="h-4 w-4" />
        </button>
      </header>
      <SearchBar mode={state.searchMode} query={state.searchQuery} onChange={explorer.search} />
      {model.notices.length > 0 ? (
        <ul className="mx-4 mb-2 rounded-lg border border-amber-200 bg-amber-50 px-3 py-2 text-xs text-amber-800 dark:border-amber-500/40 dark:bg-amber-500/10 dark:text-amber-200">
          {model.notices.map((notice) => (
            <li key={notice}>{notice}</li>
          ))}
        </ul>
      ) : null}
      <main className="grid flex-1 grid-cols-1 overflow-hidden md:grid-cols-2">
        <section className="flex flex-col overflow-hidden">
          <div className="flex items-center justify-between px-4 py-2">
            <h2 className="text-lg font-semibold">Interactive Map</h2>
            <button
              type="button"
              onClick={explorer.recenterFromMap}
              className="rounded-md border border-slate-200 px-2 py-1 text-xs hover:bg-slate-100 dark:border-slate-700 dark:hover:bg-slate-800"
            >
              Update Top 10 from current map view
            </button>
          </div>
          <div className="relative flex-1">
            <ParcelMap
              parcels={explorer.mapParcels}
              camera={state.viewport}
              onParcelClick={explorer.onMapParcelClick}
              onCameraChange={explorer.onCameraChange}
            />
            <ImpactLegend />
          </div>
        </section>
        <PropertyList
          list={model.list}
          caption={model.listCaption}
          selectedId={state.selection.selectedId}
          onLocate={explorer.onListLocate}
          onShowTopList={explorer.showTopList}
        />
      </main>
    </div>
  );
};
