/**
 * Instrument Status Service
 *
 * Status history of an instrument; at most one row per (instrument, time).
 */

import { randomUUID } from 'node:crypto';
import { withTransaction, type Sql } from '@/db/client';
import { NotFoundError } from '@/errors/apiErrors';
import type { InstrumentStatus } from '@/types/models';

const LIST_INSTRUMENT_STATUS_SQL = `
  SELECT S.id,
         S.instrument_id,
         S.status_id,
         D.name AS status,
         S.time
  FROM instrument_status S
  INNER JOIN status D ON D.id = S.status_id
`;

export interface StatusEntry {
  status_id: string;
  time: Date;
}

export async function listInstrumentStatus(
  sql: Sql,
  instrumentId: string
): Promise<InstrumentStatus[]> {
  return await sql.unsafe<InstrumentStatus[]>(
    `${LIST_INSTRUMENT_STATUS_SQL} WHERE S.instrument_id = $1 ORDER BY S.time DESC`,
    [instrumentId]
  );
}

export async function getInstrumentStatus(sql: Sql, statusId: string): Promise<InstrumentStatus> {
  const [status] = await sql.unsafe<InstrumentStatus[]>(
    `${LIST_INSTRUMENT_STATUS_SQL} WHERE S.id = $1`,
    [statusId]
  );
  if (!status) {
    throw new NotFoundError('instrument status', statusId);
  }
  return status;
}

/**
 * Record status entries; an entry at an existing time replaces that status
 */
export async function createOrUpdateInstrumentStatus(
  sql: Sql,
  instrumentId: string,
  entries: StatusEntry[]
): Promise<void> {
  if (entries.length === 0) return;

  await withTransaction(sql, async (tx) => {
    for (const entry of entries) {
      await tx.unsafe(
        `INSERT INTO instrument_status (id, instrument_id, status_id, time) VALUES ($1, $2, $3, $4)
         ON CONFLICT ON CONSTRAINT instrument_unique_status_in_time
         DO UPDATE SET status_id = EXCLUDED.status_id`,
        [randomUUID(), instrumentId, entry.status_id, entry.time]
      );
    }
  });
}

export async function deleteInstrumentStatus(
  sql: Sql,
  instrumentId: string,
  statusId: string
): Promise<void> {
  const deleted = await sql.unsafe<{ id: string }[]>(
    'DELETE FROM instrument_status WHERE instrument_id = $1 AND id = $2 RETURNING id',
    [instrumentId, statusId]
  );
  if (deleted.length === 0) {
    throw new NotFoundError('instrument status', statusId);
  }
}
