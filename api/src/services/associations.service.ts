/**
 * Association Set Reconciler
 *
 * Brings the persisted member set of an owner (e.g. the timeseries shown on
 * a plot configuration) in line with a desired set using two statements:
 * delete what is no longer wanted, insert what is missing. Run it inside
 * the caller's transaction so a failure leaves the old set untouched.
 */

import type { TransactionSql } from '@/db/client';

/**
 * Join table layout. Identifiers are interpolated into SQL and must be
 * compile-time constants, never request input.
 */
export interface AssociationTable {
  table: string;
  ownerColumn: string;
  memberColumn: string;
}

export interface ReconcileResult {
  deleted: string[];
  inserted: string[];
}

export const PLOT_CONFIGURATION_TIMESERIES: AssociationTable = {
  table: 'plot_configuration_timeseries',
  ownerColumn: 'plot_configuration_id',
  memberColumn: 'timeseries_id',
};

interface MemberRow {
  member: string;
}

/**
 * Reconcile the member set of `ownerId` to exactly `desired`
 *
 * Duplicates in `desired` are ignored. An empty `desired` removes every
 * member. Inserts skip rows that already exist (including rows a
 * concurrent writer committed first), so repeating a call is a no-op.
 */
export async function reconcileAssociations(
  tx: TransactionSql,
  association: AssociationTable,
  ownerId: string,
  desired: readonly string[]
): Promise<ReconcileResult> {
  const members = Array.from(new Set(desired));
  const { table, ownerColumn, memberColumn } = association;

  const deleted = await tx.unsafe<MemberRow[]>(
    `DELETE FROM ${table}
     WHERE ${ownerColumn} = $1
       AND ${memberColumn} <> ALL($2::uuid[])
     RETURNING ${memberColumn} AS member`,
    [ownerId, members]
  );

  if (members.length === 0) {
    return { deleted: deleted.map((row) => row.member), inserted: [] };
  }

  const inserted = await tx.unsafe<MemberRow[]>(
    `INSERT INTO ${table} (${ownerColumn}, ${memberColumn})
     SELECT $1, member FROM unnest($2::uuid[]) AS member
     ON CONFLICT DO NOTHING
     RETURNING ${memberColumn} AS member`,
    [ownerId, members]
  );

  return {
    deleted: deleted.map((row) => row.member),
    inserted: inserted.map((row) => row.member),
  };
}
