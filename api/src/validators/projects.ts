/**
 * Project Validation Schemas
 */

import { z } from 'zod';
import { name, uuid } from './common';

/**
 * POST /projects item
 */
export const projectInputSchema = z.object({
  name: name(),
  federal_id: z.string().max(240).nullable().default(null),
});

/**
 * PUT /projects/:project_id body
 */
export const projectUpdateSchema = z.object({
  id: uuid(),
  name: name(),
  federal_id: z.string().max(240).nullable().default(null),
  office_id: uuid().nullable().default(null),
  image: z.string().max(240).nullable().default(null),
});

export const projectIdParamSchema = z.object({
  project_id: uuid(),
});

export const projectTimeseriesParamSchema = z.object({
  project_id: uuid(),
  timeseries_id: uuid(),
});

export type ProjectInput = z.infer<typeof projectInputSchema>;
export type ProjectUpdate = z.infer<typeof projectUpdateSchema>;
