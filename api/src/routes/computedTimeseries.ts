/**
 * Computed Timeseries Routes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv, RouteDeps } from '@/types/hono';
import { listComputedTimeseries } from '@/services/computedTimeseries.service';
import { resolveTimeWindow } from '@/utils/timeWindow';
import { throwOnInvalid } from '@/validators/common';
import { computedTimeseriesQuerySchema } from '@/validators/timeseries';

export function createComputedTimeseriesRoutes({ sql }: RouteDeps) {
  const computed = new Hono<HonoEnv>();

  /**
   * GET /computed_timeseries?instrument_id=&after=&before=&interval=
   *
   * interval is in seconds
   */
  computed.get(
    '/computed_timeseries',
    zValidator('query', computedTimeseriesQuerySchema, throwOnInvalid),
    async (c) => {
      const query = c.req.valid('query');
      const window = resolveTimeWindow(query);
      return c.json(
        await listComputedTimeseries(sql, query.instrument_id, window, query.interval * 1000)
      );
    }
  );

  return computed;
}
