/**
 * Hono Type Extensions
 *
 * Context variables set by the auth middleware, and the dependencies
 * every route factory receives.
 */

import type { Sql } from '@/db/client';
import type { Profile } from '@/db/schema';

export type AuthType = 'token' | 'application_key';

export type HonoEnv = {
  Variables: {
    profile?: Profile;
    authType?: AuthType;
  };
};

export interface RouteDeps {
  sql: Sql;
}
