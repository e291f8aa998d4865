/**
 * Plot Configuration Service
 *
 * A plot configuration is a named set of timeseries within a project.
 * Membership lives in plot_configuration_timeseries; v_plot_configuration
 * aggregates it back into a timeseries_id array.
 */

import { withTransaction, type Sql } from '@/db/client';
import { NotFoundError } from '@/errors/apiErrors';
import type { PlotConfiguration } from '@/types/models';
import type { CreatedStamp, UpdatedStamp } from '@/utils/audit';
import {
  PLOT_CONFIGURATION_TIMESERIES,
  reconcileAssociations,
  type ReconcileResult,
} from './associations.service';
import { logger } from '@/utils/logger';

const LIST_PLOT_CONFIGURATIONS_SQL = `
  SELECT id, slug, name, project_id, timeseries_id, creator, create_date, updater, update_date
  FROM v_plot_configuration
`;

export interface NewPlotConfiguration extends CreatedStamp {
  slug: string;
  name: string;
  project_id: string;
  timeseries_id: string[];
}

export interface PlotConfigurationChanges extends UpdatedStamp {
  id: string;
  project_id: string;
  name: string;
  timeseries_id: string[];
}

interface IdRow {
  id: string;
}

interface SlugRow {
  slug: string;
}

export async function listPlotConfigurationSlugs(sql: Sql): Promise<string[]> {
  const rows = await sql.unsafe<SlugRow[]>('SELECT slug FROM plot_configuration');
  return rows.map((row) => row.slug);
}

export async function listPlotConfigurations(
  sql: Sql,
  projectId: string
): Promise<PlotConfiguration[]> {
  return await sql.unsafe<PlotConfiguration[]>(
    `${LIST_PLOT_CONFIGURATIONS_SQL} WHERE project_id = $1 ORDER BY name`,
    [projectId]
  );
}

export async function getPlotConfiguration(
  sql: Sql,
  projectId: string,
  plotConfigurationId: string
): Promise<PlotConfiguration> {
  const [plotConfiguration] = await sql.unsafe<PlotConfiguration[]>(
    `${LIST_PLOT_CONFIGURATIONS_SQL} WHERE project_id = $1 AND id = $2`,
    [projectId, plotConfigurationId]
  );
  if (!plotConfiguration) {
    throw new NotFoundError('plot configuration', plotConfigurationId);
  }
  return plotConfiguration;
}

/**
 * Insert the configuration and its timeseries together; re-read after commit
 */
export async function createPlotConfiguration(
  sql: Sql,
  input: NewPlotConfiguration
): Promise<PlotConfiguration> {
  const id = await withTransaction(sql, async (tx) => {
    const [row] = await tx.unsafe<IdRow[]>(
      `INSERT INTO plot_configuration (slug, name, project_id, creator, create_date)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING id`,
      [input.slug, input.name, input.project_id, input.creator, input.create_date]
    );
    await reconcileAssociations(tx, PLOT_CONFIGURATION_TIMESERIES, row.id, input.timeseries_id);
    return row.id;
  });

  return await getPlotConfiguration(sql, input.project_id, id);
}

/**
 * Rename and reconcile timeseries membership in one transaction
 *
 * Timeseries missing from `changes.timeseries_id` are detached, new ones
 * attached, unchanged ones left alone. Returns the state re-read after commit.
 */
export async function updatePlotConfiguration(
  sql: Sql,
  changes: PlotConfigurationChanges
): Promise<PlotConfiguration> {
  const result = await withTransaction<ReconcileResult>(sql, async (tx) => {
    const updated = await tx.unsafe<IdRow[]>(
      `UPDATE plot_configuration
       SET name = $3, updater = $4, update_date = $5
       WHERE project_id = $1 AND id = $2
       RETURNING id`,
      [changes.project_id, changes.id, changes.name, changes.updater, changes.update_date]
    );
    if (updated.length === 0) {
      throw new NotFoundError('plot configuration', changes.id);
    }
    return await reconcileAssociations(
      tx,
      PLOT_CONFIGURATION_TIMESERIES,
      changes.id,
      changes.timeseries_id
    );
  });

  logger.debug('Plot configuration timeseries reconciled', {
    plotConfigurationId: changes.id,
    deleted: result.deleted.length,
    inserted: result.inserted.length,
  });

  return await getPlotConfiguration(sql, changes.project_id, changes.id);
}

export async function deletePlotConfiguration(
  sql: Sql,
  projectId: string,
  plotConfigurationId: string
): Promise<void> {
  const deleted = await sql.unsafe<IdRow[]>(
    'DELETE FROM plot_configuration WHERE project_id = $1 AND id = $2 RETURNING id',
    [projectId, plotConfigurationId]
  );
  if (deleted.length === 0) {
    throw new NotFoundError('plot configuration', plotConfigurationId);
  }
}
