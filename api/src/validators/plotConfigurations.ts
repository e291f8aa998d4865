/**
 * Plot Configuration Validation Schemas
 */

import { z } from 'zod';
import { name, uuid } from './common';

export const plotConfigurationInputSchema = z.object({
  name: name(),
  timeseries_id: z.array(uuid()).max(500).default([]),
});

export const plotConfigurationUpdateSchema = plotConfigurationInputSchema.extend({
  id: uuid(),
});

export const plotConfigurationParamSchema = z.object({
  project_id: uuid(),
  plot_configuration_id: uuid(),
});

export type PlotConfigurationInput = z.infer<typeof plotConfigurationInputSchema>;
export type PlotConfigurationUpdate = z.infer<typeof plotConfigurationUpdateSchema>;
