/**
 * Audit Field Stamping
 *
 * Creator/updater and timestamps come from the authenticated profile and
 * the request time, never from the client payload.
 */

export interface CreatedStamp {
  creator: string;
  create_date: Date;
}

export interface UpdatedStamp {
  updater: string;
  update_date: Date;
}

export function stampCreated<T extends object>(
  items: T[],
  profileId: string,
  now: Date = new Date()
): Array<T & CreatedStamp> {
  return items.map((item) => ({ ...item, creator: profileId, create_date: now }));
}

export function stampUpdated<T extends object>(
  item: T,
  profileId: string,
  now: Date = new Date()
): T & UpdatedStamp {
  return { ...item, updater: profileId, update_date: now };
}
