/**
 * Instrument Group Routes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv, RouteDeps } from '@/types/hono';
import { BadRequestError } from '@/errors/apiErrors';
import { currentProfile, requireProfile } from '@/middleware/auth';
import {
  addInstrumentToGroup,
  createInstrumentGroups,
  deleteFlagInstrumentGroup,
  getInstrumentGroup,
  listInstrumentGroupInstruments,
  listInstrumentGroups,
  listInstrumentGroupSlugs,
  removeInstrumentFromGroup,
  updateInstrumentGroup,
} from '@/services/instrumentGroup.service';
import { stampCreated, stampUpdated } from '@/utils/audit';
import { readCollection } from '@/utils/collection';
import { assignSlugs } from '@/utils/slug';
import { throwOnInvalid } from '@/validators/common';
import {
  instrumentGroupIdParamSchema,
  instrumentGroupInputSchema,
  instrumentGroupMemberParamSchema,
  instrumentGroupUpdateSchema,
} from '@/validators/instrumentGroups';

export function createInstrumentGroupRoutes({ sql }: RouteDeps) {
  const groups = new Hono<HonoEnv>();

  groups.get('/instrument_groups', async (c) => {
    return c.json(await listInstrumentGroups(sql));
  });

  groups.get(
    '/instrument_groups/:instrument_group_id',
    zValidator('param', instrumentGroupIdParamSchema, throwOnInvalid),
    async (c) => {
      const { instrument_group_id } = c.req.valid('param');
      return c.json(await getInstrumentGroup(sql, instrument_group_id));
    }
  );

  groups.post('/instrument_groups', requireProfile, async (c) => {
    const items = await readCollection(c.req, instrumentGroupInputSchema);
    const slugs = assignSlugs(
      items.map((item) => item.name),
      await listInstrumentGroupSlugs(sql)
    );
    const stamped = stampCreated(
      items.map((item, index) => ({ ...item, slug: slugs[index] })),
      currentProfile(c).id
    );
    return c.json(await createInstrumentGroups(sql, stamped), 201);
  });

  groups.put(
    '/instrument_groups/:instrument_group_id',
    requireProfile,
    zValidator('param', instrumentGroupIdParamSchema, throwOnInvalid),
    zValidator('json', instrumentGroupUpdateSchema, throwOnInvalid),
    async (c) => {
      const { instrument_group_id } = c.req.valid('param');
      const body = c.req.valid('json');
      if (body.id !== instrument_group_id) {
        throw new BadRequestError('Instrument group id in URL does not match id in body');
      }
      return c.json(await updateInstrumentGroup(sql, stampUpdated(body, currentProfile(c).id)));
    }
  );

  groups.delete(
    '/instrument_groups/:instrument_group_id',
    requireProfile,
    zValidator('param', instrumentGroupIdParamSchema, throwOnInvalid),
    async (c) => {
      const { instrument_group_id } = c.req.valid('param');
      await deleteFlagInstrumentGroup(sql, instrument_group_id);
      return c.json({ id: instrument_group_id });
    }
  );

  groups.get(
    '/instrument_groups/:instrument_group_id/instruments',
    zValidator('param', instrumentGroupIdParamSchema, throwOnInvalid),
    async (c) => {
      const { instrument_group_id } = c.req.valid('param');
      return c.json(await listInstrumentGroupInstruments(sql, instrument_group_id));
    }
  );

  groups.post(
    '/instrument_groups/:instrument_group_id/instruments/:instrument_id',
    requireProfile,
    zValidator('param', instrumentGroupMemberParamSchema, throwOnInvalid),
    async (c) => {
      const { instrument_group_id, instrument_id } = c.req.valid('param');
      await addInstrumentToGroup(sql, instrument_group_id, instrument_id);
      return c.json({ instrument_group_id, instrument_id }, 201);
    }
  );

  groups.delete(
    '/instrument_groups/:instrument_group_id/instruments/:instrument_id',
    requireProfile,
    zValidator('param', instrumentGroupMemberParamSchema, throwOnInvalid),
    async (c) => {
      const { instrument_group_id, instrument_id } = c.req.valid('param');
      await removeInstrumentFromGroup(sql, instrument_group_id, instrument_id);
      return c.json({ instrument_group_id, instrument_id });
    }
  );

  return groups;
}
