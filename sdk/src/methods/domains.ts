import { InstrumentationHttpClient } from '../http.js';
import type { Domain, DomainGroup } from '../types.js';

export async function listDomainsMethod(http: InstrumentationHttpClient): Promise<Domain[]> {
  return http.request<Domain[]>({
    method: 'GET',
    path: '/domains',
  });
}

/**
 * Domains keyed by group, in the order the API returns them
 */
export function groupDomains(domains: Domain[]): Partial<Record<DomainGroup, Domain[]>> {
  const grouped: Partial<Record<DomainGroup, Domain[]>> = {};
  for (const domain of domains) {
    const list = grouped[domain.group] ?? [];
    list.push(domain);
    grouped[domain.group] = list;
  }
  return grouped;
}
