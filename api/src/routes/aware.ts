/**
 * AWARE Data Logger Routes
 */

import { Hono } from 'hono';
import type { HonoEnv, RouteDeps } from '@/types/hono';
import { listAwareParameters, listAwarePlatformParameterConfig } from '@/services/aware.service';

export function createAwareRoutes({ sql }: RouteDeps) {
  const aware = new Hono<HonoEnv>();

  aware.get('/aware/parameters', async (c) => {
    return c.json(await listAwareParameters(sql));
  });

  aware.get('/aware/data_acquisition_config', async (c) => {
    return c.json(await listAwarePlatformParameterConfig(sql));
  });

  return aware;
}
