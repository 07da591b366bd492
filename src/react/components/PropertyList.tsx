import { useState } from "react";
import { ChevronDownIcon, ChevronUpIcon, MapPinIcon } from "@heroicons/react/24/outline";
import type { Parcel } from "../../types/parcel";
import type { ListView } from "../../lib/listRanker";
import { formatPercentFromRatio, formatText } from "../../lib/format";
import { PropertyDetails } from "./PropertyDetails";

interface PropertyListProps {
  list: ListView;
  caption: string;
  selectedId: string | null;
  onLocate: (parcelId: string) => void;
  onShowTopList: () => void;
}

const PropertyTile = ({
  parcel,
  isSelected,
  onLocate,
}: {
  parcel: Parcel;
  isSelected: boolean;
  onLocate: (parcelId: string) => void;
}) => {
  const [expanded, setExpanded] = useState(false);

  return (
    <li
      className={`rounded-lg border px-3 py-2 shadow-sm ${
        isSelected
          ? "border-emerald-400 bg-emerald-50 dark:border-emerald-500/60 dark:bg-emerald-500/10"
          : "border-slate-200 bg-white dark:border-slate-700 dark:bg-slate-900"
      }`}
    >
      <div className="flex items-start justify-between gap-2">
        <div className="text-sm">
          <p className="font-semibold">{formatText(parcel.address)}</p>
          <p className="text-slate-500 dark:text-slate-400">New York, NY {formatText(parcel.zip5)}</p>
          <p>% Impact: {formatPercentFromRatio(parcel.impactRatio)}</p>
        </div>
        <button
          type="button"
          title="Locate on map"
          aria-label={`Locate ${formatText(parcel.address)} on map`}
          onClick={() => onLocate(parcel.id)}
          className="flex h-8 w-8 items-center justify-center rounded-lg border border-slate-200 text-slate-600 hover:bg-slate-100 dark:border-slate-700 dark:text-slate-300 dark:hover:bg-slate-800"
        >
          <MapPinIcon className="h-4 w-4" />
        </button>
      </div>
      <button
        type="button"
        onClick={() => setExpanded((prev) => !prev)}
        className="mt-2 flex items-center gap-1 text-xs font-medium text-brand-600 hover:text-brand-800 dark:text-brand-400"
      >
        Details
        {expanded ? <ChevronUpIcon className="h-3 w-3" /> : <ChevronDownIcon className="h-3 w-3" />}
      </button>
      {expanded ? <PropertyDetails parcel={parcel} /> : null}
    </li>
  );
};

export const PropertyList = ({ list, caption, selectedId, onLocate, onShowTopList }: PropertyListProps) => (
  <section className="flex h-full flex-col overflow-hidden">
    <div className="flex items-center justify-between px-4 pt-3">
      <h2 className="text-lg font-semibold">Property List</h2>
      {list.mode === "single" ? (
        <button
          type="button"
          onClick={onShowTopList}
          className="rounded-md border border-slate-200 px-2 py-1 text-xs hover:bg-slate-100 dark:border-slate-700 dark:hover:bg-slate-800"
        >
          Show Top 10 properties
        </button>
      ) : null}
    </div>
    <p className="px-4 pb-2 text-xs text-slate-500 dark:text-slate-400">{caption}</p>
    {list.parcels.length === 0 ? (
      <p className="px-4 pt-3 pb-6 text-sm text-slate-500 dark:text-slate-400">No properties found.</p>
    ) : (
      <ul className="grid flex-1 grid-cols-1 content-start gap-2 overflow-y-auto px-4 pb-4 md:grid-cols-2">
        {list.parcels.map((parcel) => (
          <PropertyTile
            key={parcel.id}
            parcel={parcel}
            isSelected={parcel.id === selectedId}
            onLocate={onLocate}
          />
        ))}
      </ul>
    )}
  </section>
);
