/**
 * Computed Timeseries
 *
 * Regularizes the raw measurements of an instrument's timeseries onto a
 * fixed interval grid anchored at the window start. Each bucket
 * [after + k*interval, after + (k+1)*interval) reports the mean of the
 * points that fall into it; empty buckets are omitted.
 */

import type { Sql } from '@/db/client';
import type { ComputedTimeseries, TimeWindow } from '@/types/models';

export interface RawMeasurementRow {
  instrument_id: string;
  timeseries_id: string;
  time: Date;
  value: number;
}

const LIST_INSTRUMENT_MEASUREMENTS_SQL = `
  SELECT T.instrument_id,
         M.timeseries_id,
         M.time,
         M.value
  FROM timeseries_measurement M
  INNER JOIN timeseries T ON T.id = M.timeseries_id
  WHERE T.instrument_id = ANY($1::uuid[])
    AND M.time > $2
    AND M.time < $3
  ORDER BY M.timeseries_id, M.time
`;

interface Bucket {
  sum: number;
  count: number;
}

export function aggregateMeasurements(
  rows: readonly RawMeasurementRow[],
  window: TimeWindow,
  intervalMs: number
): ComputedTimeseries[] {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new RangeError(`interval must be a positive number of milliseconds, got ${intervalMs}`);
  }

  const origin = window.after.getTime();
  const series = new Map<string, { instrumentId: string; buckets: Map<number, Bucket> }>();

  for (const row of rows) {
    let entry = series.get(row.timeseries_id);
    if (!entry) {
      entry = { instrumentId: row.instrument_id, buckets: new Map() };
      series.set(row.timeseries_id, entry);
    }

    const index = Math.floor((row.time.getTime() - origin) / intervalMs);
    const bucket = entry.buckets.get(index) ?? { sum: 0, count: 0 };
    bucket.sum += Number(row.value);
    bucket.count += 1;
    entry.buckets.set(index, bucket);
  }

  return Array.from(series, ([timeseriesId, entry]) => ({
    timeseries_id: timeseriesId,
    instrument_id: entry.instrumentId,
    items: Array.from(entry.buckets)
      .sort(([a], [b]) => a - b)
      .map(([index, bucket]) => ({
        time: new Date(origin + index * intervalMs),
        value: bucket.sum / bucket.count,
      })),
  }));
}

export async function listComputedTimeseries(
  sql: Sql,
  instrumentIds: string[],
  window: TimeWindow,
  intervalMs: number
): Promise<ComputedTimeseries[]> {
  const rows = await sql.unsafe<RawMeasurementRow[]>(LIST_INSTRUMENT_MEASUREMENTS_SQL, [
    instrumentIds,
    window.after,
    window.before,
  ]);
  return aggregateMeasurements(rows, window, intervalMs);
}
