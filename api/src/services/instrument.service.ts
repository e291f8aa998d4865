/**
 * Instrument Service
 *
 * Instruments carry a PostGIS point and a status history. v_instrument
 * exposes the geometry as GeoJSON plus the most recent status.
 */

import { withTransaction, type Sql } from '@/db/client';
import { NotFoundError } from '@/errors/apiErrors';
import type { GeoJsonPoint, IdAndSlug, Instrument } from '@/types/models';
import type { CreatedStamp, UpdatedStamp } from '@/utils/audit';

export const LIST_INSTRUMENTS_SQL = `
  SELECT id, project_id, slug, name, type_id, type, status_id, status, status_time,
         station, "offset", geometry, groups, creator, create_date, updater, update_date
  FROM v_instrument
`;

interface InstrumentFields {
  name: string;
  type_id: string;
  project_id: string | null;
  status_id: string;
  status_time?: Date;
  station: number | null;
  offset: number | null;
  geometry: GeoJsonPoint;
}

export interface NewInstrument extends InstrumentFields, CreatedStamp {
  slug: string;
}

export interface InstrumentChanges extends InstrumentFields, UpdatedStamp {
  id: string;
}

export interface NameConflict {
  project_id: string | null;
  name: string;
  reason: 'exists' | 'duplicate_in_payload';
}

interface ProjectInstrumentName {
  project_id: string | null;
  name: string;
}

function nameKey(projectId: string | null, name: string): string {
  return `${projectId ?? ''}\u0000${name.trim().toUpperCase()}`;
}

/**
 * Names in `candidates` already used in the same project, or repeated in the batch
 *
 * Comparison is case-insensitive and ignores surrounding whitespace.
 */
export function findNameConflicts(
  existing: readonly ProjectInstrumentName[],
  candidates: readonly ProjectInstrumentName[]
): NameConflict[] {
  const taken = new Set(existing.map((row) => nameKey(row.project_id, row.name)));
  const seen = new Set<string>();
  const conflicts: NameConflict[] = [];

  for (const candidate of candidates) {
    const key = nameKey(candidate.project_id, candidate.name);
    if (taken.has(key)) {
      conflicts.push({ project_id: candidate.project_id, name: candidate.name, reason: 'exists' });
    } else if (seen.has(key)) {
      conflicts.push({
        project_id: candidate.project_id,
        name: candidate.name,
        reason: 'duplicate_in_payload',
      });
    }
    seen.add(key);
  }

  return conflicts;
}

/**
 * Check a create batch against the names already used in its projects
 */
export async function validateInstrumentNames(
  sql: Sql,
  candidates: readonly ProjectInstrumentName[]
): Promise<NameConflict[]> {
  const projectIds = Array.from(
    new Set(candidates.map((c) => c.project_id).filter((id): id is string => id !== null))
  );

  const existing =
    projectIds.length === 0
      ? []
      : await sql.unsafe<ProjectInstrumentName[]>(
          `SELECT project_id, name
           FROM instrument
           WHERE project_id = ANY($1::uuid[]) AND NOT deleted`,
          [projectIds]
        );

  return findNameConflicts(existing, candidates);
}

export async function listInstrumentSlugs(sql: Sql): Promise<string[]> {
  const rows = await sql.unsafe<{ slug: string }[]>('SELECT slug FROM instrument');
  return rows.map((row) => row.slug);
}

export async function listInstruments(sql: Sql): Promise<Instrument[]> {
  return await sql.unsafe<Instrument[]>(`${LIST_INSTRUMENTS_SQL} WHERE NOT deleted ORDER BY name`);
}

export async function getInstrumentCount(sql: Sql): Promise<number> {
  const [row] = await sql.unsafe<{ count: string }[]>(
    'SELECT COUNT(id) AS count FROM instrument WHERE NOT deleted'
  );
  return Number(row?.count ?? 0);
}

export async function getInstrument(sql: Sql, instrumentId: string): Promise<Instrument> {
  const [instrument] = await sql.unsafe<Instrument[]>(`${LIST_INSTRUMENTS_SQL} WHERE id = $1`, [
    instrumentId,
  ]);
  if (!instrument) {
    throw new NotFoundError('instrument', instrumentId);
  }
  return instrument;
}

/**
 * Insert instruments and their initial status rows in one transaction
 */
export async function createInstruments(
  sql: Sql,
  instruments: NewInstrument[]
): Promise<IdAndSlug[]> {
  if (instruments.length === 0) return [];

  return await withTransaction(sql, async (tx) => {
    const created: IdAndSlug[] = [];
    for (const i of instruments) {
      const [row] = await tx.unsafe<IdAndSlug[]>(
        `INSERT INTO instrument (slug, name, type_id, project_id, station, "offset", geometry,
                                 creator, create_date)
         VALUES ($1, $2, $3, $4, $5, $6, ST_GeomFromGeoJSON($7), $8, $9)
         RETURNING id, slug`,
        [
          i.slug,
          i.name,
          i.type_id,
          i.project_id,
          i.station,
          i.offset,
          JSON.stringify(i.geometry),
          i.creator,
          i.create_date,
        ]
      );
      await tx.unsafe(
        'INSERT INTO instrument_status (instrument_id, status_id, time) VALUES ($1, $2, $3)',
        [row.id, i.status_id, i.status_time ?? i.create_date]
      );
      created.push(row);
    }
    return created;
  });
}

/**
 * Update instrument fields; a status change is recorded as a status row
 */
export async function updateInstrument(sql: Sql, changes: InstrumentChanges): Promise<Instrument> {
  await withTransaction(sql, async (tx) => {
    const updated = await tx.unsafe<{ id: string }[]>(
      `UPDATE instrument
       SET name = $2, type_id = $3, project_id = $4, station = $5, "offset" = $6,
           geometry = ST_GeomFromGeoJSON($7), updater = $8, update_date = $9
       WHERE id = $1
       RETURNING id`,
      [
        changes.id,
        changes.name,
        changes.type_id,
        changes.project_id,
        changes.station,
        changes.offset,
        JSON.stringify(changes.geometry),
        changes.updater,
        changes.update_date,
      ]
    );
    if (updated.length === 0) {
      throw new NotFoundError('instrument', changes.id);
    }
    await tx.unsafe(
      `INSERT INTO instrument_status (instrument_id, status_id, time)
       SELECT $1, $2, $3
       WHERE NOT EXISTS (SELECT 1 FROM v_instrument WHERE id = $1 AND status_id = $2)
       ON CONFLICT ON CONSTRAINT instrument_unique_status_in_time
       DO UPDATE SET status_id = EXCLUDED.status_id`,
      [changes.id, changes.status_id, changes.status_time ?? changes.update_date]
    );
  });

  return await getInstrument(sql, changes.id);
}

export async function deleteFlagInstrument(sql: Sql, instrumentId: string): Promise<void> {
  const updated = await sql.unsafe<{ id: string }[]>(
    'UPDATE instrument SET deleted = true WHERE id = $1 RETURNING id',
    [instrumentId]
  );
  if (updated.length === 0) {
    throw new NotFoundError('instrument', instrumentId);
  }
}
