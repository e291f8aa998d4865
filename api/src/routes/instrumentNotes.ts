/**
 * Instrument Note Routes
 *
 * Mounted before the instrument routes so /instruments/notes is not
 * taken for an instrument id.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv, RouteDeps } from '@/types/hono';
import { BadRequestError } from '@/errors/apiErrors';
import { currentProfile, requireProfile } from '@/middleware/auth';
import {
  createInstrumentNotes,
  deleteInstrumentNote,
  getInstrumentNote,
  listInstrumentNotes,
  listInstrumentNotesForInstrument,
  updateInstrumentNote,
} from '@/services/instrumentNote.service';
import { stampCreated, stampUpdated } from '@/utils/audit';
import { readCollection } from '@/utils/collection';
import { throwOnInvalid } from '@/validators/common';
import {
  instrumentIdParamSchema,
  instrumentNoteInputSchema,
  instrumentNoteUpdateSchema,
  noteIdParamSchema,
} from '@/validators/instruments';

export function createInstrumentNoteRoutes({ sql }: RouteDeps) {
  const notes = new Hono<HonoEnv>();

  notes.get('/instruments/notes', async (c) => {
    return c.json(await listInstrumentNotes(sql));
  });

  notes.get(
    '/instruments/notes/:note_id',
    zValidator('param', noteIdParamSchema, throwOnInvalid),
    async (c) => {
      const { note_id } = c.req.valid('param');
      return c.json(await getInstrumentNote(sql, note_id));
    }
  );

  notes.get(
    '/instruments/:instrument_id/notes',
    zValidator('param', instrumentIdParamSchema, throwOnInvalid),
    async (c) => {
      const { instrument_id } = c.req.valid('param');
      return c.json(await listInstrumentNotesForInstrument(sql, instrument_id));
    }
  );

  notes.post('/instruments/notes', requireProfile, async (c) => {
    const items = await readCollection(c.req, instrumentNoteInputSchema);
    const created = await createInstrumentNotes(sql, stampCreated(items, currentProfile(c).id));
    return c.json(created, 201);
  });

  notes.put(
    '/instruments/notes/:note_id',
    requireProfile,
    zValidator('param', noteIdParamSchema, throwOnInvalid),
    zValidator('json', instrumentNoteUpdateSchema, throwOnInvalid),
    async (c) => {
      const { note_id } = c.req.valid('param');
      const body = c.req.valid('json');
      if (body.id !== note_id) {
        throw new BadRequestError('Note id in URL does not match id in body');
      }
      return c.json(await updateInstrumentNote(sql, stampUpdated(body, currentProfile(c).id)));
    }
  );

  notes.delete(
    '/instruments/notes/:note_id',
    requireProfile,
    zValidator('param', noteIdParamSchema, throwOnInvalid),
    async (c) => {
      const { note_id } = c.req.valid('param');
      await deleteInstrumentNote(sql, note_id);
      return c.json({ id: note_id });
    }
  );

  return notes;
}
