import type { Parcel } from "../types/parcel";
import { DISPLAY_FLOOR_PERCENT } from "./explorerConfig";

export type ImpactCategory = "none" | "low" | "medium" | "high" | "veryHigh" | "extreme";
export type ParcelColorCategory = ImpactCategory | "selected";

export type Rgb = [number, number, number];

export const IMPACT_COLORS: Record<ParcelColorCategory, { rgb: Rgb; hex: string }> = {
  none: { rgb: [200, 200, 200], hex: "#c8c8c8" },
  low: { rgb: [34, 197, 94], hex: "#22c55e" },
  medium: { rgb: [250, 204, 21], hex: "#facc15" },
  high: { rgb: [249, 115, 22], hex: "#f97316" },
  veryHigh: { rgb: [248, 113, 113], hex: "#f87171" },
  extreme: { rgb: [220, 38, 38], hex: "#dc2626" },
  selected: { rgb: [0, 200, 0], hex: "#00c800" },
};

// Lower bound (inclusive, in percent) of each bucket, most severe first.
const IMPACT_THRESHOLDS: ReadonlyArray<{ min: number; category: ImpactCategory }> = [
  { min: 150, category: "extreme" },
  { min: 100, category: "veryHigh" },
  { min: 60, category: "high" },
  { min: 30, category: "medium" },
  { min: DISPLAY_FLOOR_PERCENT, category: "low" },
];

/** Least to most severe. */
export const IMPACT_LEGEND: ReadonlyArray<{ category: ImpactCategory; label: string; color: string }> = [
  { category: "none", label: "< 1%", color: IMPACT_COLORS.none.hex },
  { category: "low", label: "1–30%", color: IMPACT_COLORS.low.hex },
  { category: "medium", label: "30–60%", color: IMPACT_COLORS.medium.hex },
  { category: "high", label: "60–100%", color: IMPACT_COLORS.high.hex },
  { category: "veryHigh", label: "100–150%", color: IMPACT_COLORS.veryHigh.hex },
  { category: "extreme", label: "150%+", color: IMPACT_COLORS.extreme.hex },
];

export const ratioToPercent = (ratio: number | null | undefined): number | null => {
  if (typeof ratio !== "number" || !Number.isFinite(ratio)) return null;
  const percent = ratio * 100;
  return Number.isFinite(percent) ? percent : null;
};

export const impactCategory = (ratio: number | null | undefined): ImpactCategory => {
  const percent = ratioToPercent(ratio);
  if (percent === null) return "none";
  for (const threshold of IMPACT_THRESHOLDS) {
    if (percent >= threshold.min) return threshold.category;
  }
  return "none";
};

/** True when the parcel clears the display floor (i.e. is drawn in color). */
export const hasImpactSignal = (parcel: Pick<Parcel, "impactRatio">): boolean =>
  impactCategory(parcel.impactRatio) !== "none";

export const colorForParcel = (
  parcel: Pick<Parcel, "id" | "impactRatio">,
  selectedId: string | null,
): ParcelColorCategory => {
  if (selectedId !== null && parcel.id === selectedId) return "selected";
  return impactCategory(parcel.impactRatio);
};
