import { InstrumentationValidationError } from '../errors.js';
import { InstrumentationHttpClient } from '../http.js';
import type {
  ComputedTimeseries,
  ListComputedTimeseriesInput,
  ListMeasurementsInput,
  Measurement,
  MeasurementCollection,
  MeasurementCollectionInput,
  RequestControl,
} from '../types.js';
import { toIso, toIsoOptional } from './wire.js';

interface MeasurementCollectionEnvelope {
  timeseries_id: string;
  items: Measurement[];
}

interface ComputedTimeseriesEnvelope extends MeasurementCollectionEnvelope {
  instrument_id: string;
}

function mapCollection(row: MeasurementCollectionEnvelope): MeasurementCollection {
  return { timeseriesId: row.timeseries_id, items: row.items };
}

/**
 * Upsert points; a point at an existing (timeseries, time) replaces the stored value
 */
export async function upsertMeasurementsMethod(
  http: InstrumentationHttpClient,
  input: MeasurementCollectionInput[],
  control: RequestControl = {},
): Promise<MeasurementCollection[]> {
  for (const collection of input) {
    for (const point of collection.items) {
      if (!Number.isFinite(point.value)) {
        throw new InstrumentationValidationError(
          `measurement value must be a finite number (timeseries ${collection.timeseriesId})`,
          { status: 400, code: 'INVALID_ARGS' },
        );
      }
    }
  }

  const rows = await http.request<MeasurementCollectionEnvelope[]>({
    method: 'POST',
    path: '/timeseries_measurements',
    body: input.map((collection) => ({
      timeseries_id: collection.timeseriesId,
      items: collection.items.map((point) => ({ time: toIso(point.time), value: point.value })),
    })),
    ...control,
  });
  return rows.map(mapCollection);
}

/**
 * Points strictly between `after` and `before`, newest first
 */
export async function listMeasurementsMethod(
  http: InstrumentationHttpClient,
  input: ListMeasurementsInput,
  control: RequestControl = {},
): Promise<MeasurementCollection> {
  const row = await http.request<MeasurementCollectionEnvelope>({
    method: 'GET',
    path: `/timeseries/${encodeURIComponent(input.timeseriesId)}/measurements`,
    query: {
      after: toIsoOptional(input.after),
      before: toIsoOptional(input.before),
    },
    ...control,
  });
  return mapCollection(row);
}

export async function listComputedTimeseriesMethod(
  http: InstrumentationHttpClient,
  input: ListComputedTimeseriesInput,
  control: RequestControl = {},
): Promise<ComputedTimeseries[]> {
  if (input.instrumentIds.length === 0) {
    throw new InstrumentationValidationError('at least one instrument id is required', {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }

  const rows = await http.request<ComputedTimeseriesEnvelope[]>({
    method: 'GET',
    path: '/computed_timeseries',
    query: {
      instrument_id: input.instrumentIds,
      after: toIsoOptional(input.after),
      before: toIsoOptional(input.before),
      interval: input.interval,
    },
    ...control,
  });
  return rows.map((row) => ({ ...mapCollection(row), instrumentId: row.instrument_id }));
}
