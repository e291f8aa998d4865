import type { Audit, TimeInput } from '../types.js';

/** Audit columns as the API serializes them */
export interface AuditEnvelope {
  creator: string;
  create_date: string;
  updater: string | null;
  update_date: string | null;
}

export function mapAudit(row: AuditEnvelope): Audit {
  return {
    creator: row.creator,
    createDate: row.create_date,
    updater: row.updater,
    updateDate: row.update_date,
  };
}

export function toIso(value: TimeInput): string {
  return value instanceof Date ? value.toISOString() : value;
}

export function toIsoOptional(value: TimeInput | undefined): string | undefined {
  return value === undefined ? undefined : toIso(value);
}
