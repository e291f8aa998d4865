/**
 * AWARE Data Logger Service
 *
 * AWARE platforms push readings keyed by parameter name. The acquisition
 * config tells each platform which timeseries every parameter key feeds.
 */

import type { Sql } from '@/db/client';
import type { AwareParameter, AwarePlatformParameterConfig } from '@/types/models';

export interface AwarePlatformParameterRow {
  instrument_id: string;
  aware_id: string;
  aware_parameter_key: string;
  timeseries_id: string | null;
}

export async function listAwareParameters(sql: Sql): Promise<AwareParameter[]> {
  return await sql.unsafe<AwareParameter[]>(
    'SELECT id, key, parameter_id, unit_id FROM aware_parameter ORDER BY key'
  );
}

/**
 * Fold one row per (platform, parameter) into one config per platform
 */
export function buildPlatformConfigs(
  rows: readonly AwarePlatformParameterRow[]
): AwarePlatformParameterConfig[] {
  const configs = new Map<string, AwarePlatformParameterConfig>();

  for (const row of rows) {
    let config = configs.get(row.aware_id);
    if (!config) {
      config = { instrument_id: row.instrument_id, aware_id: row.aware_id, aware_parameters: {} };
      configs.set(row.aware_id, config);
    }
    config.aware_parameters[row.aware_parameter_key] = row.timeseries_id;
  }

  return Array.from(configs.values());
}

export async function listAwarePlatformParameterConfig(
  sql: Sql
): Promise<AwarePlatformParameterConfig[]> {
  const rows = await sql.unsafe<AwarePlatformParameterRow[]>(
    `SELECT A.instrument_id,
            A.aware_id,
            B.key AS aware_parameter_key,
            T.id AS timeseries_id
     FROM aware_platform A
     INNER JOIN aware_platform_parameter_enabled E ON E.aware_platform_id = A.id
     INNER JOIN aware_parameter B ON B.id = E.aware_parameter_id
     LEFT JOIN timeseries T
            ON T.instrument_id = A.instrument_id
           AND T.parameter_id = B.parameter_id
           AND T.unit_id = B.unit_id
     ORDER BY A.aware_id, B.key`
  );
  return buildPlatformConfigs(rows);
}
