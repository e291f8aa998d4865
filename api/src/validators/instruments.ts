/**
 * Instrument, Note and Status Validation Schemas
 */

import { z } from 'zod';
import { geometrySchema, isoDate, name, uuid } from './common';

/**
 * POST /instruments item
 */
export const instrumentInputSchema = z.object({
  name: name(),
  type_id: uuid(),
  project_id: uuid().nullable().default(null),
  status_id: uuid(),
  status_time: isoDate().optional(),
  station: z.number().int().nullable().default(null),
  offset: z.number().int().nullable().default(null),
  geometry: geometrySchema,
});

/**
 * PUT /instruments/:instrument_id body
 */
export const instrumentUpdateSchema = instrumentInputSchema.extend({
  id: uuid(),
});

export const instrumentIdParamSchema = z.object({
  instrument_id: uuid(),
});

/**
 * POST /instruments/notes item
 */
export const instrumentNoteInputSchema = z.object({
  instrument_id: uuid(),
  title: z.string().trim().min(1).max(480),
  body: z.string().default(''),
  time: isoDate(),
});

/**
 * PUT /instruments/notes/:note_id body
 */
export const instrumentNoteUpdateSchema = z.object({
  id: uuid(),
  title: z.string().trim().min(1).max(480),
  body: z.string().default(''),
  time: isoDate(),
});

export const noteIdParamSchema = z.object({
  note_id: uuid(),
});

/**
 * POST /instruments/:instrument_id/status item
 */
export const instrumentStatusInputSchema = z.object({
  status_id: uuid(),
  time: isoDate(),
});

export const statusIdParamSchema = z.object({
  instrument_id: uuid(),
  status_id: uuid(),
});

export type InstrumentInput = z.infer<typeof instrumentInputSchema>;
export type InstrumentUpdate = z.infer<typeof instrumentUpdateSchema>;
export type InstrumentNoteInput = z.infer<typeof instrumentNoteInputSchema>;
export type InstrumentNoteUpdate = z.infer<typeof instrumentNoteUpdateSchema>;
export type InstrumentStatusInput = z.infer<typeof instrumentStatusInputSchema>;
