/**
 * Authentication Middleware
 *
 * Resolves the caller from:
 * - Bearer token (Authorization header)
 * - X-API-Key header (alternative to Bearer)
 * - ?key= application key (data loggers posting measurements)
 *
 * Sets context variables:
 * - c.get('profile') - Authenticated profile, when resolved from a token
 * - c.get('authType') - 'token' | 'application_key'
 */

import type { Context, MiddlewareHandler, Next } from 'hono';
import { and, eq, isNull } from 'drizzle-orm';
import type { Db } from '@/db/client';
import { profiles, profileTokens, type Profile } from '@/db/schema';
import type { ErrorResponse } from '@/middleware/errorHandler';
import type { HonoEnv } from '@/types/hono';
import type { AppConfig } from '@/utils/config';
import { constantTimeCompare, hashToken, isWellFormedToken } from '@/utils/crypto';
import { logger } from '@/utils/logger';

export interface AuthDeps {
  db: Db;
  config: Pick<AppConfig, 'nodeEnv' | 'applicationKey'>;
}

/**
 * Look up the profile owning an unrevoked token
 */
export async function findProfileByToken(db: Db, token: string): Promise<Profile | null> {
  if (!isWellFormedToken(token)) {
    return null;
  }

  const [row] = await db
    .select({ profile: profiles })
    .from(profileTokens)
    .innerJoin(profiles, eq(profileTokens.profileId, profiles.id))
    .where(and(eq(profileTokens.hash, hashToken(token)), isNull(profileTokens.revokedAt)))
    .limit(1);

  return row?.profile ?? null;
}

function testProfile(profileId: string, username: string): Profile {
  return { id: profileId, edipi: 0, username, email: `${username}@example.com` };
}

function bearerToken(c: Context<HonoEnv>): string | undefined {
  const authHeader = c.req.header('Authorization');
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.substring(7);
  }
  return c.req.header('X-API-Key');
}

/**
 * Authentication resolver middleware
 *
 * Never rejects a request; the guards below decide what each route needs.
 */
export function createAuthResolver(deps: AuthDeps): MiddlewareHandler<HonoEnv> {
  return async (c, next) => {
    // In test env, allow test headers set by integration test helpers
    if (deps.config.nodeEnv === 'test') {
      const testProfileId = c.req.header('x-test-profile-id');
      if (testProfileId) {
        const username = c.req.header('x-test-username') ?? 'test-user';
        c.set('profile', testProfile(testProfileId, username));
        c.set('authType', 'token');
        return next();
      }
    }

    const token = bearerToken(c);
    if (token) {
      const profile = await findProfileByToken(deps.db, token);
      if (profile) {
        c.set('profile', profile);
        c.set('authType', 'token');
        return next();
      }
      logger.debug('Rejected API token', { path: c.req.path });
    }

    const key = c.req.query('key');
    if (key && deps.config.applicationKey && constantTimeCompare(key, deps.config.applicationKey)) {
      c.set('authType', 'application_key');
    }

    return next();
  };
}

function unauthenticated(c: Context<HonoEnv>): Response {
  return c.json<ErrorResponse>(
    {
      error: {
        code: 'UNAUTHENTICATED',
        message: 'Authentication required',
      },
    },
    401
  );
}

/**
 * Require a profile resolved from a token
 */
export async function requireProfile(c: Context<HonoEnv>, next: Next) {
  if (!c.get('profile')) {
    return unauthenticated(c);
  }
  return next();
}

/**
 * Require a profile or the shared application key
 */
export async function requireProfileOrApplicationKey(c: Context<HonoEnv>, next: Next) {
  if (!c.get('profile') && c.get('authType') !== 'application_key') {
    return unauthenticated(c);
  }
  return next();
}

/**
 * The authenticated profile; only valid behind requireProfile
 */
export function currentProfile(c: Context<HonoEnv>): Profile {
  const profile = c.get('profile');
  if (!profile) {
    throw new Error('UNAUTHENTICATED: no profile on request context');
  }
  return profile;
}
