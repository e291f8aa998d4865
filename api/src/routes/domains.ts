/**
 * Domain Routes
 *
 * Lookup values for instrument types, parameters, units, statuses and roles
 */

import { Hono } from 'hono';
import type { HonoEnv, RouteDeps } from '@/types/hono';
import { groupDomains, listDomains } from '@/services/domain.service';

export function createDomainRoutes({ sql }: RouteDeps) {
  const domains = new Hono<HonoEnv>();

  /**
   * GET /domains
   */
  domains.get('/domains', async (c) => {
    return c.json(await listDomains(sql));
  });

  /**
   * GET /domains/map
   *
   * Same values keyed by group
   */
  domains.get('/domains/map', async (c) => {
    return c.json(groupDomains(await listDomains(sql)));
  });

  return domains;
}
