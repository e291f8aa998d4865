/**
 * Timeseries Measurement Routes
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv, RouteDeps } from '@/types/hono';
import { requireProfileOrApplicationKey } from '@/middleware/auth';
import {
  collectionTimeseriesIds,
  countPoints,
  listMeasurements,
  upsertMeasurements,
} from '@/services/measurement.service';
import { readCollection } from '@/utils/collection';
import { logger } from '@/utils/logger';
import { resolveTimeWindow } from '@/utils/timeWindow';
import { throwOnInvalid, timeWindowQuerySchema } from '@/validators/common';
import { measurementCollectionSchema, timeseriesIdParamSchema } from '@/validators/timeseries';

export function createTimeseriesRoutes({ sql }: RouteDeps) {
  const timeseries = new Hono<HonoEnv>();

  /**
   * GET /timeseries/:timeseries_id/measurements?after=&before=
   *
   * Both bounds are exclusive; newest point first
   */
  timeseries.get(
    '/timeseries/:timeseries_id/measurements',
    zValidator('param', timeseriesIdParamSchema, throwOnInvalid),
    zValidator('query', timeWindowQuerySchema, throwOnInvalid),
    async (c) => {
      const { timeseries_id } = c.req.valid('param');
      const window = resolveTimeWindow(c.req.valid('query'));
      return c.json(await listMeasurements(sql, timeseries_id, window));
    }
  );

  /**
   * POST /timeseries_measurements
   *
   * One collection or an array; existing (timeseries_id, time) points are overwritten
   */
  timeseries.post('/timeseries_measurements', requireProfileOrApplicationKey, async (c) => {
    const collections = await readCollection(c.req, measurementCollectionSchema);
    const stored = await upsertMeasurements(sql, collections);

    logger.info('Measurements stored', {
      timeseries: collectionTimeseriesIds(stored).length,
      points: countPoints(stored),
      authType: c.get('authType'),
    });

    return c.json(stored, 201);
  });

  return timeseries;
}
