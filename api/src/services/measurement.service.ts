/**
 * Timeseries Measurement Service
 *
 * Points are stored one row per (timeseries_id, time); the
 * timeseries_unique_time constraint makes every write an upsert.
 */

import { withTransaction, type Sql } from '@/db/client';
import type { Measurement, MeasurementCollection, TimeWindow } from '@/types/models';

interface MeasurementRow {
  time: Date;
  value: number;
}

const UPSERT_MEASUREMENT_SQL = `
  INSERT INTO timeseries_measurement (timeseries_id, time, value)
  VALUES ($1, $2, $3)
  ON CONFLICT ON CONSTRAINT timeseries_unique_time DO UPDATE SET value = EXCLUDED.value
`;

const LIST_MEASUREMENTS_SQL = `
  SELECT M.time,
         M.value
  FROM timeseries_measurement M
  INNER JOIN timeseries T ON T.id = M.timeseries_id
  WHERE T.id = $1
    AND M.time > $2
    AND M.time < $3
  ORDER BY M.time DESC
`;

/**
 * Distinct timeseries ids referenced by a batch, in first-seen order
 */
export function collectionTimeseriesIds(collections: readonly MeasurementCollection[]): string[] {
  return Array.from(new Set(collections.map((c) => c.timeseries_id)));
}

export function countPoints(collections: readonly MeasurementCollection[]): number {
  return collections.reduce((sum, c) => sum + c.items.length, 0);
}

/**
 * Upsert every point of every collection in one transaction
 *
 * An existing row for (timeseries_id, time) has its value overwritten.
 * Any failing point aborts the whole batch. Returns the input unchanged.
 */
export async function upsertMeasurements(
  sql: Sql,
  collections: MeasurementCollection[]
): Promise<MeasurementCollection[]> {
  if (countPoints(collections) === 0) {
    return collections;
  }

  await withTransaction(sql, async (tx) => {
    for (const collection of collections) {
      for (const point of collection.items) {
        await tx.unsafe(UPSERT_MEASUREMENT_SQL, [collection.timeseries_id, point.time, point.value]);
      }
    }
  });

  return collections;
}

/**
 * Points of one timeseries strictly inside `window`, newest first
 */
export async function listMeasurements(
  sql: Sql,
  timeseriesId: string,
  window: TimeWindow
): Promise<MeasurementCollection> {
  const rows = await sql.unsafe<MeasurementRow[]>(LIST_MEASUREMENTS_SQL, [
    timeseriesId,
    window.after,
    window.before,
  ]);

  const items: Measurement[] = rows.map((row) => ({ time: row.time, value: Number(row.value) }));
  return { timeseries_id: timeseriesId, items };
}
