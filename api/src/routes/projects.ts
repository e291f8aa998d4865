/**
 * Project Routes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv, RouteDeps } from '@/types/hono';
import { BadRequestError } from '@/errors/apiErrors';
import { currentProfile, requireProfile } from '@/middleware/auth';
import {
  addProjectTimeseries,
  createProjects,
  deleteFlagProject,
  getProject,
  getProjectCount,
  listProjectInstrumentGroups,
  listProjectInstrumentNames,
  listProjectInstruments,
  listProjects,
  listProjectSlugs,
  removeProjectTimeseries,
  updateProject,
} from '@/services/project.service';
import { stampCreated, stampUpdated } from '@/utils/audit';
import { readCollection } from '@/utils/collection';
import { assignSlugs } from '@/utils/slug';
import { throwOnInvalid } from '@/validators/common';
import {
  projectIdParamSchema,
  projectInputSchema,
  projectTimeseriesParamSchema,
  projectUpdateSchema,
} from '@/validators/projects';

export function createProjectRoutes({ sql }: RouteDeps) {
  const projects = new Hono<HonoEnv>();

  projects.get('/projects', async (c) => {
    return c.json(await listProjects(sql));
  });

  projects.get('/projects/count', async (c) => {
    return c.json({ count: await getProjectCount(sql) });
  });

  projects.get(
    '/projects/:project_id',
    zValidator('param', projectIdParamSchema, throwOnInvalid),
    async (c) => {
      const { project_id } = c.req.valid('param');
      return c.json(await getProject(sql, project_id));
    }
  );

  /**
   * POST /projects
   *
   * Accepts one project or an array; returns the new ids and slugs
   */
  projects.post('/projects', requireProfile, async (c) => {
    const items = await readCollection(c.req, projectInputSchema);
    const slugs = assignSlugs(
      items.map((item) => item.name),
      await listProjectSlugs(sql)
    );
    const stamped = stampCreated(
      items.map((item, index) => ({ ...item, slug: slugs[index] })),
      currentProfile(c).id
    );
    return c.json(await createProjects(sql, stamped), 201);
  });

  projects.put(
    '/projects/:project_id',
    requireProfile,
    zValidator('param', projectIdParamSchema, throwOnInvalid),
    zValidator('json', projectUpdateSchema, throwOnInvalid),
    async (c) => {
      const { project_id } = c.req.valid('param');
      const body = c.req.valid('json');
      if (body.id !== project_id) {
        throw new BadRequestError('Project id in URL does not match id in body');
      }
      const updated = await updateProject(sql, stampUpdated(body, currentProfile(c).id));
      return c.json(updated);
    }
  );

  projects.delete(
    '/projects/:project_id',
    requireProfile,
    zValidator('param', projectIdParamSchema, throwOnInvalid),
    async (c) => {
      const { project_id } = c.req.valid('param');
      await deleteFlagProject(sql, project_id);
      return c.json({ id: project_id });
    }
  );

  projects.get(
    '/projects/:project_id/instruments',
    zValidator('param', projectIdParamSchema, throwOnInvalid),
    async (c) => {
      const { project_id } = c.req.valid('param');
      return c.json(await listProjectInstruments(sql, project_id));
    }
  );

  projects.get(
    '/projects/:project_id/instruments/names',
    zValidator('param', projectIdParamSchema, throwOnInvalid),
    async (c) => {
      const { project_id } = c.req.valid('param');
      return c.json(await listProjectInstrumentNames(sql, project_id));
    }
  );

  projects.get(
    '/projects/:project_id/instrument_groups',
    zValidator('param', projectIdParamSchema, throwOnInvalid),
    async (c) => {
      const { project_id } = c.req.valid('param');
      return c.json(await listProjectInstrumentGroups(sql, project_id));
    }
  );

  projects.post(
    '/projects/:project_id/timeseries/:timeseries_id',
    requireProfile,
    zValidator('param', projectTimeseriesParamSchema, throwOnInvalid),
    async (c) => {
      const { project_id, timeseries_id } = c.req.valid('param');
      await addProjectTimeseries(sql, project_id, timeseries_id);
      return c.json({ project_id, timeseries_id });
    }
  );

  projects.delete(
    '/projects/:project_id/timeseries/:timeseries_id',
    requireProfile,
    zValidator('param', projectTimeseriesParamSchema, throwOnInvalid),
    async (c) => {
      const { project_id, timeseries_id } = c.req.valid('param');
      await removeProjectTimeseries(sql, project_id, timeseries_id);
      return c.json({ project_id, timeseries_id });
    }
  );

  return projects;
}
