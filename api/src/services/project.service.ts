/**
 * Project Service
 *
 * Projects are soft-deleted (deleted = true) and read through v_project,
 * which carries instrument counts and the project-level timeseries.
 */

import { withTransaction, type Sql } from '@/db/client';
import { NotFoundError } from '@/errors/apiErrors';
import type { IdAndSlug, Instrument, InstrumentGroup, Project } from '@/types/models';
import type { CreatedStamp, UpdatedStamp } from '@/utils/audit';
import { LIST_INSTRUMENTS_SQL } from './instrument.service';
import { LIST_INSTRUMENT_GROUPS_SQL } from './instrumentGroup.service';

const LIST_PROJECTS_SQL = `
  SELECT id, federal_id, image, office_id, slug, name, creator, create_date,
         updater, update_date, instrument_count, instrument_group_count, timeseries
  FROM v_project
`;

export interface NewProject extends CreatedStamp {
  slug: string;
  name: string;
  federal_id: string | null;
}

export interface ProjectChanges extends UpdatedStamp {
  id: string;
  name: string;
  federal_id: string | null;
  office_id: string | null;
  image: string | null;
}

interface CountRow {
  count: string;
}

export async function listProjectSlugs(sql: Sql): Promise<string[]> {
  const rows = await sql.unsafe<{ slug: string }[]>('SELECT slug FROM project');
  return rows.map((row) => row.slug);
}

export async function listProjects(sql: Sql): Promise<Project[]> {
  return await sql.unsafe<Project[]>(`${LIST_PROJECTS_SQL} WHERE NOT deleted ORDER BY name`);
}

/**
 * Projects the profile holds any role on
 */
export async function listMyProjects(sql: Sql, profileId: string): Promise<Project[]> {
  return await sql.unsafe<Project[]>(
    `SELECT DISTINCT p.id, p.federal_id, p.image, p.office_id, p.slug, p.name, p.creator,
                     p.create_date, p.updater, p.update_date, p.instrument_count,
                     p.instrument_group_count, p.timeseries
     FROM profile_project_roles ppr
     INNER JOIN v_project p ON p.id = ppr.project_id
     WHERE ppr.profile_id = $1 AND NOT p.deleted
     ORDER BY p.name`,
    [profileId]
  );
}

export async function getProjectCount(sql: Sql): Promise<number> {
  const [row] = await sql.unsafe<CountRow[]>('SELECT COUNT(id) AS count FROM project WHERE NOT deleted');
  return Number(row?.count ?? 0);
}

export async function getProject(sql: Sql, projectId: string): Promise<Project> {
  const [project] = await sql.unsafe<Project[]>(`${LIST_PROJECTS_SQL} WHERE id = $1`, [projectId]);
  if (!project) {
    throw new NotFoundError('project', projectId);
  }
  return project;
}

/**
 * Insert every project in one transaction
 */
export async function createProjects(sql: Sql, projects: NewProject[]): Promise<IdAndSlug[]> {
  if (projects.length === 0) return [];

  return await withTransaction(sql, async (tx) => {
    const created: IdAndSlug[] = [];
    for (const p of projects) {
      const [row] = await tx.unsafe<IdAndSlug[]>(
        `INSERT INTO project (federal_id, slug, name, creator, create_date)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING id, slug`,
        [p.federal_id, p.slug, p.name, p.creator, p.create_date]
      );
      created.push(row);
    }
    return created;
  });
}

export async function updateProject(sql: Sql, changes: ProjectChanges): Promise<Project> {
  const updated = await sql.unsafe<{ id: string }[]>(
    `UPDATE project
     SET name = $2, updater = $3, update_date = $4, office_id = $5, federal_id = $6, image = $7
     WHERE id = $1
     RETURNING id`,
    [
      changes.id,
      changes.name,
      changes.updater,
      changes.update_date,
      changes.office_id,
      changes.federal_id,
      changes.image,
    ]
  );
  if (updated.length === 0) {
    throw new NotFoundError('project', changes.id);
  }
  return await getProject(sql, changes.id);
}

export async function deleteFlagProject(sql: Sql, projectId: string): Promise<void> {
  const updated = await sql.unsafe<{ id: string }[]>(
    'UPDATE project SET deleted = true WHERE id = $1 RETURNING id',
    [projectId]
  );
  if (updated.length === 0) {
    throw new NotFoundError('project', projectId);
  }
}

export async function listProjectInstruments(sql: Sql, projectId: string): Promise<Instrument[]> {
  return await sql.unsafe<Instrument[]>(
    `${LIST_INSTRUMENTS_SQL} WHERE project_id = $1 AND NOT deleted ORDER BY name`,
    [projectId]
  );
}

export async function listProjectInstrumentNames(sql: Sql, projectId: string): Promise<string[]> {
  const rows = await sql.unsafe<{ name: string }[]>(
    'SELECT name FROM instrument WHERE project_id = $1 AND NOT deleted ORDER BY name',
    [projectId]
  );
  return rows.map((row) => row.name);
}

export async function listProjectInstrumentGroups(
  sql: Sql,
  projectId: string
): Promise<InstrumentGroup[]> {
  return await sql.unsafe<InstrumentGroup[]>(
    `${LIST_INSTRUMENT_GROUPS_SQL} WHERE project_id = $1 AND NOT deleted ORDER BY name`,
    [projectId]
  );
}

/**
 * Promote a timeseries to the project level; already promoted is not an error
 */
export async function addProjectTimeseries(
  sql: Sql,
  projectId: string,
  timeseriesId: string
): Promise<void> {
  await sql.unsafe(
    `INSERT INTO project_timeseries (project_id, timeseries_id) VALUES ($1, $2)
     ON CONFLICT ON CONSTRAINT project_unique_timeseries DO NOTHING`,
    [projectId, timeseriesId]
  );
}

/**
 * Remove a timeseries from the project level; the timeseries itself is kept
 */
export async function removeProjectTimeseries(
  sql: Sql,
  projectId: string,
  timeseriesId: string
): Promise<void> {
  await sql.unsafe('DELETE FROM project_timeseries WHERE project_id = $1 AND timeseries_id = $2', [
    projectId,
    timeseriesId,
  ]);
}
