import { useEffect, useState } from "react";
import { SEARCH_MODE_LABELS, type SearchMode } from "../../types/parcel";

interface SearchBarProps {
  mode: SearchMode;
  query: string;
  onChange: (mode: SearchMode, query: string) => void;
}

const SEARCH_MODES: SearchMode[] = ["address", "zip", "borough"];

const SearchIcon = () => (
  <svg viewBox="0 0 20 20" fill="currentColor" aria-hidden="true" className="h-4 w-4 text-slate-400 dark:text-slate-500">
    <path
      fillRule="evenodd"
      d="M9 3.5a5.5 5.5 0 013.894 9.394l3.703 3.703a.75.75 0 11-1.06 1.06l-3.703-3.703A5.5 5.5 0 119 3.5zm0 1.5a4 4 0 100 8 4 4 0 000-8z"
      clipRule="evenodd"
    />
  </svg>
);

const isSearchMode = (value: string): value is SearchMode =>
  SEARCH_MODES.some((mode) => mode === value);

export const SearchBar = ({ mode, query, onChange }: SearchBarProps) => {
  const [draft, setDraft] = useState(query);

  useEffect(() => {
    setDraft(query);
  }, [query]);

  const submit = () => onChange(mode, draft);

  return (
    <div className="flex flex-col gap-1 px-4 py-3">
      <div className="flex flex-wrap items-center gap-2">
        <label className="text-xs font-medium text-slate-500 dark:text-slate-400" htmlFor="search-mode">
          Search by
        </label>
        <select
          id="search-mode"
          value={mode}
          onChange={(event) => {
            const next = event.target.value;
            if (isSearchMode(next)) onChange(next, draft);
          }}
          className="rounded-md border border-slate-200 bg-white px-2 py-1 text-sm dark:border-slate-700 dark:bg-slate-900"
        >
          {SEARCH_MODES.map((value) => (
            <option key={value} value={value}>
              {SEARCH_MODE_LABELS[value]}
            </option>
          ))}
        </select>
        <div className="flex flex-1 items-center gap-2 rounded-md border border-slate-200 bg-white px-2 py-1 dark:border-slate-700 dark:bg-slate-900">
          <SearchIcon />
          <input
            type="search"
            value={draft}
            placeholder="Type to search…"
            onChange={(event) => setDraft(event.target.value)}
            onKeyDown={(event) => {
              if (event.key === "Enter") submit();
            }}
            onBlur={submit}
            className="flex-1 bg-transparent text-sm outline-none"
          />
        </div>
      </div>
      <p className="text-xs text-slate-500 dark:text-slate-400">
        Tip: Use borough abbreviations for Borough search (MN: Manhattan, BX: Bronx, BK: Brooklyn, QN: Queens, SI: Staten Island).
      </p>
    </div>
  );
};
