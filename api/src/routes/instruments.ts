/**
 * Instrument Routes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv, RouteDeps } from '@/types/hono';
import { BadRequestError } from '@/errors/apiErrors';
import { currentProfile, requireProfile } from '@/middleware/auth';
import {
  createInstruments,
  deleteFlagInstrument,
  getInstrument,
  getInstrumentCount,
  listInstruments,
  listInstrumentSlugs,
  updateInstrument,
  validateInstrumentNames,
} from '@/services/instrument.service';
import { stampCreated, stampUpdated } from '@/utils/audit';
import { readCollection } from '@/utils/collection';
import { assignSlugs } from '@/utils/slug';
import { throwOnInvalid } from '@/validators/common';
import {
  instrumentIdParamSchema,
  instrumentInputSchema,
  instrumentUpdateSchema,
} from '@/validators/instruments';

export function createInstrumentRoutes({ sql }: RouteDeps) {
  const instruments = new Hono<HonoEnv>();

  instruments.get('/instruments', async (c) => {
    return c.json(await listInstruments(sql));
  });

  instruments.get('/instruments/count', async (c) => {
    return c.json({ count: await getInstrumentCount(sql) });
  });

  instruments.get(
    '/instruments/:instrument_id',
    zValidator('param', instrumentIdParamSchema, throwOnInvalid),
    async (c) => {
      const { instrument_id } = c.req.valid('param');
      return c.json(await getInstrument(sql, instrument_id));
    }
  );

  /**
   * POST /instruments
   *
   * Names must be unique per project, ignoring case
   */
  instruments.post('/instruments', requireProfile, async (c) => {
    const items = await readCollection(c.req, instrumentInputSchema);

    const conflicts = await validateInstrumentNames(sql, items);
    if (conflicts.length > 0) {
      throw new BadRequestError('Instrument names must be unique within a project', conflicts);
    }

    const slugs = assignSlugs(
      items.map((item) => item.name),
      await listInstrumentSlugs(sql)
    );
    const stamped = stampCreated(
      items.map((item, index) => ({ ...item, slug: slugs[index] })),
      currentProfile(c).id
    );
    return c.json(await createInstruments(sql, stamped), 201);
  });

  instruments.put(
    '/instruments/:instrument_id',
    requireProfile,
    zValidator('param', instrumentIdParamSchema, throwOnInvalid),
    zValidator('json', instrumentUpdateSchema, throwOnInvalid),
    async (c) => {
      const { instrument_id } = c.req.valid('param');
      const body = c.req.valid('json');
      if (body.id !== instrument_id) {
        throw new BadRequestError('Instrument id in URL does not match id in body');
      }
      return c.json(await updateInstrument(sql, stampUpdated(body, currentProfile(c).id)));
    }
  );

  instruments.delete(
    '/instruments/:instrument_id',
    requireProfile,
    zValidator('param', instrumentIdParamSchema, throwOnInvalid),
    async (c) => {
      const { instrument_id } = c.req.valid('param');
      await deleteFlagInstrument(sql, instrument_id);
      return c.json({ id: instrument_id });
    }
  );

  return instruments;
}
