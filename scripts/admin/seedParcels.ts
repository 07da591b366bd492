#!/usr/bin/env node
// Load a parcel GeoJSON export into InstantDB.
//
//   ogr2ogr -f GeoJSON parcels.geojson PG:"$DATABASE_URL" -sql "SELECT ... FROM gdf_merged" -t_srs EPSG:4326
//   npm run seed:parcels -- --file parcels.geojson            # dry run
//   npm run seed:parcels -- --file parcels.geojson --apply    # write
import "dotenv/config";

import { readFile } from "node:fs/promises";
import minimist from "minimist";
import { init as initAdmin, id } from "@instantdb/admin";

import schema from "../../src/instant.schema";
import { requireEnvString } from "../../src/lib/env";
import { featureToSeedRow, type ParcelSeedRow, type SourceFeature } from "../_shared/parcelColumns";

const args = minimist(process.argv.slice(2), {
  boolean: ["apply"],
  string: ["file"],
  default: { apply: false, chunk: 200 },
});

const APPLY = Boolean(args.apply);
const CHUNK_SIZE = Math.max(Number(args.chunk) || 200, 1);
const FILE = typeof args.file === "string" ? args.file : "";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

const readFeatures = async (path: string): Promise<SourceFeature[]> => {
  const parsed: unknown = JSON.parse(await readFile(path, "utf8"));
  if (!isRecord(parsed) || parsed.type !== "FeatureCollection" || !Array.isArray(parsed.features)) {
    throw new Error(`${path} is not a GeoJSON FeatureCollection`);
  }
  const features: SourceFeature[] = [];
  for (const feature of parsed.features) {
    if (!isRecord(feature)) continue;
    features.push({
      geometry: feature.geometry,
      properties: isRecord(feature.properties) ? feature.properties : null,
    });
  }
  return features;
};

async function seedParcels(): Promise<void> {
  if (!FILE) {
    throw new Error("Pass the GeoJSON export with --file <path>");
  }

  console.log(`[seed:parcels] Reading ${FILE}…`);
  const features = await readFeatures(FILE);

  const rows = new Map<string, ParcelSeedRow>();
  let skipped = 0;
  let withoutGeometry = 0;
  for (const feature of features) {
    const row = featureToSeedRow(feature);
    if (!row) {
      skipped += 1;
      continue;
    }
    if (!row.geometry) withoutGeometry += 1;
    rows.set(row.bbl, row);
  }
  console.log(
    `[seed:parcels] ${rows.size} parcels prepared (${skipped} rows without BBL, ${withoutGeometry} without usable geometry).`,
  );

  if (!APPLY) {
    console.log("[seed:parcels] Dry run; pass --apply to write to InstantDB.");
    return;
  }

  const db = initAdmin({
    appId: requireEnvString("INSTANT_APP_ID", "VITE_INSTANT_APP_ID"),
    adminToken: requireEnvString("INSTANT_APP_ADMIN_TOKEN"),
    schema,
  });

  console.log("[seed:parcels] Loading existing parcels…");
  const existing = await db.query({ parcels: {} });
  const idByBbl = new Map<string, string>();
  for (const parcel of existing.parcels) {
    idByBbl.set(parcel.bbl, parcel.id);
  }

  const now = Date.now();
  const txs = Array.from(rows.values()).map((row) =>
    db.tx.parcels[idByBbl.get(row.bbl) ?? id()].update({ ...row, updatedAt: now }),
  );

  for (let start = 0; start < txs.length; start += CHUNK_SIZE) {
    const chunk = txs.slice(start, start + CHUNK_SIZE);
    await db.transact(chunk);
    console.log(`[seed:parcels] Wrote ${Math.min(start + CHUNK_SIZE, txs.length)}/${txs.length}`);
  }
  console.log("[seed:parcels] Seed completed successfully.");
}

seedParcels().catch((error) => {
  console.error("[seed:parcels] Seed failed:", error);
  process.exit(1);
});
