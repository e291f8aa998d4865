/**
 * Instrument Status Routes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv, RouteDeps } from '@/types/hono';
import { requireProfile } from '@/middleware/auth';
import {
  createOrUpdateInstrumentStatus,
  deleteInstrumentStatus,
  getInstrumentStatus,
  listInstrumentStatus,
} from '@/services/instrumentStatus.service';
import { readCollection } from '@/utils/collection';
import { throwOnInvalid } from '@/validators/common';
import {
  instrumentIdParamSchema,
  instrumentStatusInputSchema,
  statusIdParamSchema,
} from '@/validators/instruments';

export function createInstrumentStatusRoutes({ sql }: RouteDeps) {
  const status = new Hono<HonoEnv>();

  status.get(
    '/instruments/:instrument_id/status',
    zValidator('param', instrumentIdParamSchema, throwOnInvalid),
    async (c) => {
      const { instrument_id } = c.req.valid('param');
      return c.json(await listInstrumentStatus(sql, instrument_id));
    }
  );

  status.get(
    '/instruments/:instrument_id/status/:status_id',
    zValidator('param', statusIdParamSchema, throwOnInvalid),
    async (c) => {
      const { status_id } = c.req.valid('param');
      return c.json(await getInstrumentStatus(sql, status_id));
    }
  );

  /**
   * POST /instruments/:instrument_id/status
   *
   * One entry or an array; an entry at an existing time replaces it
   */
  status.post(
    '/instruments/:instrument_id/status',
    requireProfile,
    zValidator('param', instrumentIdParamSchema, throwOnInvalid),
    async (c) => {
      const { instrument_id } = c.req.valid('param');
      const entries = await readCollection(c.req, instrumentStatusInputSchema);
      await createOrUpdateInstrumentStatus(sql, instrument_id, entries);
      return c.json(await listInstrumentStatus(sql, instrument_id), 201);
    }
  );

  status.delete(
    '/instruments/:instrument_id/status/:status_id',
    requireProfile,
    zValidator('param', statusIdParamSchema, throwOnInvalid),
    async (c) => {
      const { instrument_id, status_id } = c.req.valid('param');
      await deleteInstrumentStatus(sql, instrument_id, status_id);
      return c.json({ id: status_id });
    }
  );

  return status;
}
