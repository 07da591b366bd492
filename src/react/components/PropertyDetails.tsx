import type { Parcel } from "../../types/parcel";
import {
  formatAreaSqft,
  formatDecimal,
  formatHeight,
  formatInt,
  formatPercentFromRatio,
  formatText,
} from "../../lib/format";

interface DetailField {
  label: string;
  value: (parcel: Parcel) => string;
}

const DETAIL_FIELDS: DetailField[] = [
  { label: "BBL", value: (p) => formatText(p.id) },
  { label: "Borough", value: (p) => formatText(p.boroughCode) },
  { label: "ZIP Code", value: (p) => formatText(p.zip5) },
  { label: "Address", value: (p) => formatText(p.address) },
  { label: "New Units", value: (p) => formatInt(p.details.newUnits) },
  { label: "% Impact", value: (p) => formatPercentFromRatio(p.impactRatio) },
  { label: "New Floors", value: (p) => formatInt(p.details.newFloors) },
  { label: "New Building Height", value: (p) => formatHeight(p.details.newBuildingHeight) },
  { label: "Air Rights", value: (p) => formatText(p.details.airRights) },
  { label: "Number of Existing Floors", value: (p) => formatInt(p.details.existingFloors) },
  { label: "Residential Area", value: (p) => formatAreaSqft(p.details.residentialArea) },
  { label: "Commercial Area", value: (p) => formatAreaSqft(p.details.commercialArea) },
  { label: "Units Residential", value: (p) => formatInt(p.details.unitsResidential) },
  { label: "Units Commercial", value: (p) => formatInt(p.details.unitsCommercial) },
  { label: "Units Total", value: (p) => formatInt(p.details.unitsTotal) },
  { label: "Year Built", value: (p) => formatInt(p.details.yearBuilt) },
  { label: "Zoning District 1", value: (p) => formatText(p.details.zoningDistrict) },
  { label: "Building Class", value: (p) => formatText(p.details.buildingClass) },
  { label: "Owner", value: (p) => formatText(p.details.owner) },
  { label: "FAR Built", value: (p) => formatDecimal(p.details.farBuilt) },
  { label: "FAR Residential", value: (p) => formatDecimal(p.details.farResidential) },
  { label: "FAR Commercial", value: (p) => formatDecimal(p.details.farCommercial) },
];

export const PropertyDetails = ({ parcel }: { parcel: Parcel }) => (
  <dl className="grid grid-cols-2 gap-x-4 gap-y-3 pt-2">
    {DETAIL_FIELDS.map((field) => (
      <div key={field.label}>
        <dt className="text-[13px] text-slate-500 dark:text-slate-400">{field.label}</dt>
        <dd className="text-base font-medium">{field.value(parcel)}</dd>
      </div>
    ))}
  </dl>
);
