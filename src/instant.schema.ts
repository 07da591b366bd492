// Docs: https://www.instantdb.com/docs/modeling-data

import { i } from '@instantdb/react';

const _schema = i.schema({
  entities: {
    // One row per tax lot, loaded by scripts/admin/seedParcels.ts
    parcels: i.entity({
      bbl: i.string().unique().indexed(),
      borough: i.string().indexed().optional(),
      address: i.string().optional(),
      zipcode: i.string().indexed().optional(),
      impactRatio: i.number().indexed().optional(),
      newUnits: i.number().optional(),
      newFloors: i.number().optional(),
      newBuildingHeight: i.number().optional(),
      airRights: i.string().optional(),
      existingFloors: i.number().optional(),
      residentialArea: i.number().optional(),
      commercialArea: i.number().optional(),
      unitsResidential: i.number().optional(),
      unitsCommercial: i.number().optional(),
      unitsTotal: i.number().optional(),
      yearBuilt: i.number().optional(),
      farBuilt: i.number().optional(),
      farResidential: i.number().optional(),
      farCommercial: i.number().optional(),
      zoningDistrict: i.string().optional(),
      buildingClass: i.string().optional(),
      owner: i.string().optional(),
      // GeoJSON Polygon / MultiPolygon in EPSG:4326
      geometry: i.json<Record<string, unknown>>().optional(),
      updatedAt: i.number().indexed().optional(),
    }),
  },
  links: {},
  rooms: {},
});

// This helps Typescript display nicer intellisense
type _AppSchema = typeof _schema;
interface AppSchema extends _AppSchema {}
const schema: AppSchema = _schema;

export type { AppSchema };
export default schema;
