/**
 * Instrument Group Service
 */

import { withTransaction, type Sql } from '@/db/client';
import { NotFoundError } from '@/errors/apiErrors';
import type { Instrument, InstrumentGroup } from '@/types/models';
import type { CreatedStamp, UpdatedStamp } from '@/utils/audit';
import { LIST_INSTRUMENTS_SQL } from './instrument.service';

export const LIST_INSTRUMENT_GROUPS_SQL = `
  SELECT id, slug, name, description, creator, create_date, updater, update_date,
         project_id, instrument_count, timeseries_count
  FROM v_instrument_group
`;

export interface NewInstrumentGroup extends CreatedStamp {
  slug: string;
  name: string;
  description: string;
  project_id: string | null;
}

export interface InstrumentGroupChanges extends UpdatedStamp {
  id: string;
  name: string;
  description: string;
  project_id: string | null;
}

export async function listInstrumentGroupSlugs(sql: Sql): Promise<string[]> {
  const rows = await sql.unsafe<{ slug: string }[]>('SELECT slug FROM instrument_group');
  return rows.map((row) => row.slug);
}

export async function listInstrumentGroups(sql: Sql): Promise<InstrumentGroup[]> {
  return await sql.unsafe<InstrumentGroup[]>(
    `${LIST_INSTRUMENT_GROUPS_SQL} WHERE NOT deleted ORDER BY name`
  );
}

export async function getInstrumentGroup(sql: Sql, groupId: string): Promise<InstrumentGroup> {
  const [group] = await sql.unsafe<InstrumentGroup[]>(
    `${LIST_INSTRUMENT_GROUPS_SQL} WHERE id = $1`,
    [groupId]
  );
  if (!group) {
    throw new NotFoundError('instrument group', groupId);
  }
  return group;
}

export async function createInstrumentGroups(
  sql: Sql,
  groups: NewInstrumentGroup[]
): Promise<InstrumentGroup[]> {
  if (groups.length === 0) return [];

  return await withTransaction(sql, async (tx) => {
    const created: InstrumentGroup[] = [];
    for (const g of groups) {
      const [row] = await tx.unsafe<InstrumentGroup[]>(
        `INSERT INTO instrument_group (slug, name, description, creator, create_date, project_id)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING id, slug, name, description, creator, create_date, updater, update_date,
                   project_id, 0 AS instrument_count, 0 AS timeseries_count`,
        [g.slug, g.name, g.description, g.creator, g.create_date, g.project_id]
      );
      created.push(row);
    }
    return created;
  });
}

export async function updateInstrumentGroup(
  sql: Sql,
  changes: InstrumentGroupChanges
): Promise<InstrumentGroup> {
  const updated = await sql.unsafe<{ id: string }[]>(
    `UPDATE instrument_group
     SET name = $2, description = $3, updater = $4, update_date = $5, project_id = $6
     WHERE id = $1
     RETURNING id`,
    [
      changes.id,
      changes.name,
      changes.description,
      changes.updater,
      changes.update_date,
      changes.project_id,
    ]
  );
  if (updated.length === 0) {
    throw new NotFoundError('instrument group', changes.id);
  }
  return await getInstrumentGroup(sql, changes.id);
}

export async function deleteFlagInstrumentGroup(sql: Sql, groupId: string): Promise<void> {
  const updated = await sql.unsafe<{ id: string }[]>(
    'UPDATE instrument_group SET deleted = true WHERE id = $1 RETURNING id',
    [groupId]
  );
  if (updated.length === 0) {
    throw new NotFoundError('instrument group', groupId);
  }
}

export async function listInstrumentGroupInstruments(
  sql: Sql,
  groupId: string
): Promise<Instrument[]> {
  return await sql.unsafe<Instrument[]>(
    `SELECT B.*
     FROM instrument_group_instruments A
     INNER JOIN (${LIST_INSTRUMENTS_SQL} WHERE NOT deleted) B ON A.instrument_id = B.id
     WHERE A.instrument_group_id = $1
     ORDER BY B.name`,
    [groupId]
  );
}

export async function addInstrumentToGroup(
  sql: Sql,
  groupId: string,
  instrumentId: string
): Promise<void> {
  await sql.unsafe(
    `INSERT INTO instrument_group_instruments (instrument_group_id, instrument_id) VALUES ($1, $2)
     ON CONFLICT DO NOTHING`,
    [groupId, instrumentId]
  );
}

export async function removeInstrumentFromGroup(
  sql: Sql,
  groupId: string,
  instrumentId: string
): Promise<void> {
  await sql.unsafe(
    'DELETE FROM instrument_group_instruments WHERE instrument_group_id = $1 AND instrument_id = $2',
    [groupId, instrumentId]
  );
}
