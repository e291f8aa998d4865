import { describe, it, expect } from 'vitest';
import { NotFoundError } from '@/errors/apiErrors';
import {
  createOrUpdateInstrumentStatus,
  deleteInstrumentStatus,
  getInstrumentStatus,
} from '@/services/instrumentStatus.service';
import { createMockSql } from '../../helpers/db';

const INSTRUMENT = '2f3a4b5c-6d7e-4f80-9a1b-2c3d4e5f6a7b';
const ACTIVE = '4b5c6d7e-8f9a-4b0c-9d1e-2f3a4b5c6d7e';
const INACTIVE = '5c6d7e8f-9a0b-4c1d-8e2f-3a4b5c6d7e8f';
const STATUS = '6d7e8f9a-0b1c-4d2e-9f3a-4b5c6d7e8f9a';
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe('instrumentStatus.service', () => {
  it('upserts every entry with a fresh id in one transaction', async () => {
    const mock = createMockSql();
    const first = new Date('2024-01-01T00:00:00Z');
    const second = new Date('2024-02-01T00:00:00Z');

    await createOrUpdateInstrumentStatus(mock.sql, INSTRUMENT, [
      { status_id: ACTIVE, time: first },
      { status_id: INACTIVE, time: second },
    ]);

    expect(mock.commits).toBe(1);
    expect(mock.queries).toHaveLength(2);
    expect(mock.queries[0].text).toContain(
      'ON CONFLICT ON CONSTRAINT instrument_unique_status_in_time DO UPDATE SET status_id = EXCLUDED.status_id'
    );
    const [id1, ...rest1] = mock.queries[0].params;
    const [id2, ...rest2] = mock.queries[1].params;
    expect(id1).toMatch(UUID_PATTERN);
    expect(id2).toMatch(UUID_PATTERN);
    expect(id1).not.toBe(id2);
    expect(rest1).toEqual([INSTRUMENT, ACTIVE, first]);
    expect(rest2).toEqual([INSTRUMENT, INACTIVE, second]);
  });

  it('does nothing for no entries', async () => {
    const mock = createMockSql();

    await createOrUpdateInstrumentStatus(mock.sql, INSTRUMENT, []);

    expect(mock.queries).toHaveLength(0);
  });

  it('throws NotFoundError for unknown status rows', async () => {
    const mock = createMockSql();

    await expect(getInstrumentStatus(mock.sql, STATUS)).rejects.toBeInstanceOf(NotFoundError);
    await expect(deleteInstrumentStatus(mock.sql, INSTRUMENT, STATUS)).rejects.toThrow(
      `instrument status ${STATUS} not found`
    );
  });
});
