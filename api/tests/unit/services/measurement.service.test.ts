import { describe, it, expect } from 'vitest';
import {
  collectionTimeseriesIds,
  countPoints,
  listMeasurements,
  upsertMeasurements,
} from '@/services/measurement.service';
import type { MeasurementCollection } from '@/types/models';
import { createMockSql, type RecordedQuery } from '../../helpers/db';

const SERIES_S = '0b7e3c1a-4f2d-4e6b-9a8c-1d2e3f4a5b6c';
const SERIES_T = '9c8d7e6f-5a4b-4c3d-8e2f-1a0b9c8d7e6f';

const at = (hhmm: string) => new Date(`2024-01-01T${hhmm}:00Z`);

/**
 * timeseries_measurement held in a Map keyed by (timeseries_id, time)
 */
function createMeasurementStore(initial: Array<[string, Date, number]> = []) {
  const rows = new Map<string, { timeseries_id: string; time: Date; value: number }>();
  const put = (timeseriesId: string, time: Date, value: number) =>
    rows.set(`${timeseriesId}@${time.toISOString()}`, { timeseries_id: timeseriesId, time, value });
  for (const [id, time, value] of initial) put(id, time, value);

  const handler = (query: RecordedQuery) => {
    if (query.text.startsWith('INSERT INTO timeseries_measurement')) {
      const [id, time, value] = query.params;
      if (typeof id === 'string' && time instanceof Date && typeof value === 'number') {
        put(id, time, value);
      }
      return [];
    }
    if (query.text.startsWith('SELECT M.time')) {
      const [id, after, before] = query.params;
      if (!(after instanceof Date) || !(before instanceof Date)) return [];
      return Array.from(rows.values())
        .filter((row) => row.timeseries_id === id && row.time > after && row.time < before)
        .sort((a, b) => b.time.getTime() - a.time.getTime())
        .map(({ time, value }) => ({ time, value }));
    }
    return undefined;
  };

  return { rows, handler };
}

describe('upsertMeasurements', () => {
  it('writes every point of every collection in one transaction', async () => {
    const mock = createMockSql();
    const input: MeasurementCollection[] = [
      { timeseries_id: SERIES_S, items: [{ time: at('10:00'), value: 1 }, { time: at('11:00'), value: 2 }] },
      { timeseries_id: SERIES_T, items: [{ time: at('10:00'), value: 7.5 }] },
    ];

    const result = await upsertMeasurements(mock.sql, input);

    expect(result).toBe(input);
    expect(mock.commits).toBe(1);
    expect(mock.queries).toHaveLength(3);
    expect(mock.queries.every((q) => q.inTransaction)).toBe(true);
    expect(mock.queries[0].text).toContain(
      'ON CONFLICT ON CONSTRAINT timeseries_unique_time DO UPDATE SET value = EXCLUDED.value'
    );
    expect(mock.queries.map((q) => q.params)).toEqual([
      [SERIES_S, at('10:00'), 1],
      [SERIES_S, at('11:00'), 2],
      [SERIES_T, at('10:00'), 7.5],
    ]);
  });

  it('does not open a transaction when there are no points', async () => {
    const mock = createMockSql();

    await expect(upsertMeasurements(mock.sql, [])).resolves.toEqual([]);
    const empty = [{ timeseries_id: SERIES_S, items: [] }];
    await expect(upsertMeasurements(mock.sql, empty)).resolves.toBe(empty);

    expect(mock.queries).toHaveLength(0);
    expect(mock.commits + mock.rollbacks).toBe(0);
  });

  it('rolls back the whole batch when one point fails', async () => {
    const mock = createMockSql();
    mock.queue([]);
    mock.fail(new Error('insert or update on table "timeseries_measurement" violates foreign key'));

    await expect(
      upsertMeasurements(mock.sql, [
        {
          timeseries_id: SERIES_S,
          items: [
            { time: at('10:00'), value: 1 },
            { time: at('11:00'), value: 2 },
            { time: at('12:00'), value: 3 },
          ],
        },
      ])
    ).rejects.toThrow('violates foreign key');

    expect(mock.commits).toBe(0);
    expect(mock.rollbacks).toBe(1);
    expect(mock.queries).toHaveLength(2);
  });

  it('overwrites existing points and adds new ones', async () => {
    const store = createMeasurementStore([
      [SERIES_S, at('10:00'), 1.0],
      [SERIES_S, at('11:00'), 2.0],
    ]);
    const mock = createMockSql(store.handler);

    await upsertMeasurements(mock.sql, [
      { timeseries_id: SERIES_S, items: [{ time: at('11:00'), value: 3.0 }, { time: at('12:00'), value: 4.0 }] },
    ]);

    const stored = await listMeasurements(mock.sql, SERIES_S, {
      after: at('00:00'),
      before: at('23:00'),
    });
    expect(stored.items).toEqual([
      { time: at('12:00'), value: 4.0 },
      { time: at('11:00'), value: 3.0 },
      { time: at('10:00'), value: 1.0 },
    ]);
    expect(store.rows.size).toBe(3);
  });

  it('keeps one row holding the second value when a point is written twice', async () => {
    const store = createMeasurementStore();
    const mock = createMockSql(store.handler);

    await upsertMeasurements(mock.sql, [{ timeseries_id: SERIES_S, items: [{ time: at('10:00'), value: 1 }] }]);
    await upsertMeasurements(mock.sql, [{ timeseries_id: SERIES_S, items: [{ time: at('10:00'), value: 9 }] }]);

    expect(Array.from(store.rows.values())).toEqual([
      { timeseries_id: SERIES_S, time: at('10:00'), value: 9 },
    ]);
  });
});

describe('listMeasurements', () => {
  it('filters strictly inside the window, newest first', async () => {
    const mock = createMockSql();
    mock.queue([
      { time: at('11:00'), value: '3.25' },
      { time: at('10:30'), value: 1 },
    ]);
    const window = { after: at('10:00'), before: at('12:00') };

    const result = await listMeasurements(mock.sql, SERIES_S, window);

    expect(result).toEqual({
      timeseries_id: SERIES_S,
      items: [
        { time: at('11:00'), value: 3.25 },
        { time: at('10:30'), value: 1 },
      ],
    });
    expect(mock.queries[0].text).toContain(
      'INNER JOIN timeseries T ON T.id = M.timeseries_id WHERE T.id = $1 AND M.time > $2 AND M.time < $3 ORDER BY M.time DESC'
    );
    expect(mock.queries[0].params).toEqual([SERIES_S, window.after, window.before]);
  });

  it('never returns points on the bounds', async () => {
    const store = createMeasurementStore([
      [SERIES_S, at('10:00'), 1],
      [SERIES_S, at('10:01'), 2],
      [SERIES_S, at('11:59'), 3],
      [SERIES_S, at('12:00'), 4],
    ]);
    const mock = createMockSql(store.handler);

    const result = await listMeasurements(mock.sql, SERIES_S, {
      after: at('10:00'),
      before: at('12:00'),
    });

    expect(result.items.map((item) => item.value)).toEqual([3, 2]);
  });

  it('returns an empty list when nothing matches', async () => {
    const mock = createMockSql();

    await expect(
      listMeasurements(mock.sql, SERIES_T, { after: at('10:00'), before: at('11:00') })
    ).resolves.toEqual({ timeseries_id: SERIES_T, items: [] });
  });
});

describe('batch helpers', () => {
  it('lists distinct timeseries ids and counts points', () => {
    const batch = [
      { timeseries_id: SERIES_T, items: [{ time: at('10:00'), value: 1 }] },
      { timeseries_id: SERIES_S, items: [] },
      { timeseries_id: SERIES_T, items: [{ time: at('11:00'), value: 2 }] },
    ];

    expect(collectionTimeseriesIds(batch)).toEqual([SERIES_T, SERIES_S]);
    expect(countPoints(batch)).toBe(2);
  });
});
