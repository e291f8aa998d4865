/**
 * Domain Service
 *
 * Lookup values from every small reference table, flattened into one list
 */

import type { Sql } from '@/db/client';
import type { Domain } from '@/types/models';

const LIST_DOMAINS_SQL = `
  SELECT id, 'instrument_type' AS "group", name AS value, NULL AS description FROM instrument_type
  UNION
  SELECT id, 'parameter' AS "group", name AS value, NULL AS description FROM parameter
  UNION
  SELECT id, 'unit' AS "group", name AS value, NULL AS description FROM unit
  UNION
  SELECT id, 'status' AS "group", name AS value, description FROM status
  UNION
  SELECT id, 'role' AS "group", name AS value, NULL AS description FROM role
  ORDER BY "group", value
`;

export async function listDomains(sql: Sql): Promise<Domain[]> {
  return await sql.unsafe<Domain[]>(LIST_DOMAINS_SQL);
}

/**
 * Domains keyed by group, each list in the order the query returned it
 */
export function groupDomains(domains: readonly Domain[]): Record<string, Domain[]> {
  const grouped: Record<string, Domain[]> = {};
  for (const domain of domains) {
    (grouped[domain.group] ??= []).push(domain);
  }
  return grouped;
}
