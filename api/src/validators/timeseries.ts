/**
 * Measurement and Computed Timeseries Validation Schemas
 */

import { z } from 'zod';
import { isoDate, timeWindowQuerySchema, uuid } from './common';

export const measurementSchema = z.object({
  time: isoDate(),
  value: z.number().finite(),
});

/**
 * POST /timeseries_measurements item: one series and its points
 */
export const measurementCollectionSchema = z.object({
  timeseries_id: uuid(),
  items: z.array(measurementSchema).default([]),
});

export const timeseriesIdParamSchema = z.object({
  timeseries_id: uuid(),
});

/**
 * GET /computed_timeseries?instrument_id=..&instrument_id=..&interval=3600
 */
export const computedTimeseriesQuerySchema = timeWindowQuerySchema.extend({
  instrument_id: z.preprocess(
    (value) => (typeof value === 'string' ? [value] : value),
    z.array(uuid()).min(1).max(100)
  ),
  interval: z.coerce.number().int().min(1).max(31 * 24 * 3600).default(3600),
});

export type MeasurementCollectionInput = z.infer<typeof measurementCollectionSchema>;
export type ComputedTimeseriesQuery = z.infer<typeof computedTimeseriesQuerySchema>;
