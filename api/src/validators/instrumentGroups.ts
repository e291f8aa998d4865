/**
 * Instrument Group Validation Schemas
 */

import { z } from 'zod';
import { name, uuid } from './common';

export const instrumentGroupInputSchema = z.object({
  name: name(),
  description: z.string().max(2000).default(''),
  project_id: uuid().nullable().default(null),
});

export const instrumentGroupUpdateSchema = instrumentGroupInputSchema.extend({
  id: uuid(),
});

export const instrumentGroupIdParamSchema = z.object({
  instrument_group_id: uuid(),
});

export const instrumentGroupMemberParamSchema = z.object({
  instrument_group_id: uuid(),
  instrument_id: uuid(),
});

export type InstrumentGroupInput = z.infer<typeof instrumentGroupInputSchema>;
export type InstrumentGroupUpdate = z.infer<typeof instrumentGroupUpdateSchema>;
