/**
 * Drizzle Schema
 *
 * Only the identity tables are modelled here; they back token
 * authentication and /my_profile. Monitoring tables and views are queried
 * with plain SQL by the services (see sql/init.sql).
 */

import { pgTable, uuid, varchar, bigint, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Application users
 */
export const profiles = pgTable('profile', {
  id: uuid('id').primaryKey().defaultRandom(),
  edipi: bigint('edipi', { mode: 'number' }).notNull().unique(),
  username: varchar('username', { length: 240 }).notNull().unique(),
  email: varchar('email', { length: 240 }).notNull().unique(),
});

/**
 * API tokens issued to a profile; only the SHA-256 hash is stored
 */
export const profileTokens = pgTable(
  'profile_token',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tokenId: varchar('token_id', { length: 64 }).notNull().unique(),
    profileId: uuid('profile_id')
      .notNull()
      .references(() => profiles.id, { onDelete: 'cascade' }),
    hash: varchar('hash', { length: 64 }).notNull().unique(),
    issued: timestamp('issued', { withTimezone: true }).notNull().defaultNow(),
    revokedAt: timestamp('revoked_at', { withTimezone: true }),
  },
  (table) => ({
    profileIdx: index('idx_profile_token_profile').on(table.profileId),
  })
);

export type Profile = typeof profiles.$inferSelect;
