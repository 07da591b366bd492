import { IMPACT_COLORS, IMPACT_LEGEND } from "../../lib/impactColors";

export const ImpactLegend = () => (
  <div className="absolute bottom-4 left-4 rounded-lg border border-slate-200 bg-white/90 px-3 py-2 text-xs shadow-sm dark:border-slate-700 dark:bg-slate-900/90">
    <p className="mb-1 font-semibold">% Impact</p>
    <ul className="space-y-1">
      {IMPACT_LEGEND.map((entry) => (
        <li key={entry.category} className="flex items-center gap-2">
          <span className="inline-block h-3 w-3 rounded-sm" style={{ backgroundColor: entry.color }} />
          {entry.label}
        </li>
      ))}
      <li className="flex items-center gap-2">
        <span className="inline-block h-3 w-3 rounded-sm" style={{ backgroundColor: IMPACT_COLORS.selected.hex }} />
        Selected
      </li>
    </ul>
  </div>
);
