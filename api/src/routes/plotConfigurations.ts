/**
 * Plot Configuration Routes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv, RouteDeps } from '@/types/hono';
import { BadRequestError } from '@/errors/apiErrors';
import { currentProfile, requireProfile } from '@/middleware/auth';
import {
  createPlotConfiguration,
  deletePlotConfiguration,
  getPlotConfiguration,
  listPlotConfigurations,
  listPlotConfigurationSlugs,
  updatePlotConfiguration,
} from '@/services/plotConfiguration.service';
import { stampCreated, stampUpdated } from '@/utils/audit';
import { nextUniqueSlug } from '@/utils/slug';
import { throwOnInvalid } from '@/validators/common';
import {
  plotConfigurationInputSchema,
  plotConfigurationParamSchema,
  plotConfigurationUpdateSchema,
} from '@/validators/plotConfigurations';
import { projectIdParamSchema } from '@/validators/projects';

export function createPlotConfigurationRoutes({ sql }: RouteDeps) {
  const plots = new Hono<HonoEnv>();

  plots.get(
    '/projects/:project_id/plot_configurations',
    zValidator('param', projectIdParamSchema, throwOnInvalid),
    async (c) => {
      const { project_id } = c.req.valid('param');
      return c.json(await listPlotConfigurations(sql, project_id));
    }
  );

  plots.get(
    '/projects/:project_id/plot_configurations/:plot_configuration_id',
    zValidator('param', plotConfigurationParamSchema, throwOnInvalid),
    async (c) => {
      const { project_id, plot_configuration_id } = c.req.valid('param');
      return c.json(await getPlotConfiguration(sql, project_id, plot_configuration_id));
    }
  );

  plots.post(
    '/projects/:project_id/plot_configurations',
    requireProfile,
    zValidator('param', projectIdParamSchema, throwOnInvalid),
    zValidator('json', plotConfigurationInputSchema, throwOnInvalid),
    async (c) => {
      const { project_id } = c.req.valid('param');
      const body = c.req.valid('json');
      const slug = nextUniqueSlug(body.name, await listPlotConfigurationSlugs(sql));
      const [input] = stampCreated([{ ...body, slug, project_id }], currentProfile(c).id);
      return c.json(await createPlotConfiguration(sql, input), 201);
    }
  );

  /**
   * PUT /projects/:project_id/plot_configurations/:plot_configuration_id
   *
   * Replaces the name and the full timeseries set
   */
  plots.put(
    '/projects/:project_id/plot_configurations/:plot_configuration_id',
    requireProfile,
    zValidator('param', plotConfigurationParamSchema, throwOnInvalid),
    zValidator('json', plotConfigurationUpdateSchema, throwOnInvalid),
    async (c) => {
      const { project_id, plot_configuration_id } = c.req.valid('param');
      const body = c.req.valid('json');
      if (body.id !== plot_configuration_id) {
        throw new BadRequestError('Plot configuration id in URL does not match id in body');
      }
      const changes = stampUpdated({ ...body, project_id }, currentProfile(c).id);
      return c.json(await updatePlotConfiguration(sql, changes));
    }
  );

  plots.delete(
    '/projects/:project_id/plot_configurations/:plot_configuration_id',
    requireProfile,
    zValidator('param', plotConfigurationParamSchema, throwOnInvalid),
    async (c) => {
      const { project_id, plot_configuration_id } = c.req.valid('param');
      await deletePlotConfiguration(sql, project_id, plot_configuration_id);
      return c.json({ id: plot_configuration_id });
    }
  );

  return plots;
}
