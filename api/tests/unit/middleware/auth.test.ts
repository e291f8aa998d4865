import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import {
  createAuthResolver,
  findProfileByToken,
  requireProfile,
  requireProfileOrApplicationKey,
} from '@/middleware/auth';
import type { AppConfig } from '@/utils/config';
import type { HonoEnv } from '@/types/hono';
import { generateApiToken } from '@/utils/crypto';
import { createMockDb } from '../../helpers/db';

const PROFILE = {
  id: 'b3c4d5e6-f7a8-4b9c-8d0e-1f2a3b4c5d6e',
  edipi: 1234567890,
  username: 'field.tech',
  email: 'field.tech@example.com',
};

type AuthConfig = Pick<AppConfig, 'nodeEnv' | 'applicationKey'>;

function whoamiApp(dbRows: unknown[], config: AuthConfig) {
  const { db, select } = createMockDb(dbRows);
  const app = new Hono<HonoEnv>();
  app.use('*', createAuthResolver({ db, config }));
  app.get('/whoami', (c) =>
    c.json({ profile: c.get('profile') ?? null, authType: c.get('authType') ?? null })
  );
  app.post('/profile-only', requireProfile, (c) => c.json({ ok: true }));
  app.post('/measurements', requireProfileOrApplicationKey, (c) => c.json({ ok: true }));
  return { app, select };
}

const production: AuthConfig = { nodeEnv: 'production', applicationKey: 'test-application-key' };

describe('findProfileByToken', () => {
  it('skips the lookup for malformed tokens', async () => {
    const { db, select } = createMockDb([{ profile: PROFILE }]);

    await expect(findProfileByToken(db, 'test-secret')).resolves.toBeNull();
    expect(select).not.toHaveBeenCalled();
  });

  it('returns the profile of an active token', async () => {
    const { db } = createMockDb([{ profile: PROFILE }]);

    await expect(findProfileByToken(db, generateApiToken().token)).resolves.toEqual(PROFILE);
  });

  it('returns null when no active token matches', async () => {
    const { db } = createMockDb([]);

    await expect(findProfileByToken(db, generateApiToken().token)).resolves.toBeNull();
  });
});

describe('createAuthResolver', () => {
  it('authenticates a Bearer token', async () => {
    const { app } = whoamiApp([{ profile: PROFILE }], production);

    const res = await app.request('/whoami', {
      headers: { Authorization: `Bearer ${generateApiToken().token}` },
    });

    expect(await res.json()).toEqual({ profile: PROFILE, authType: 'token' });
  });

  it('authenticates the X-API-Key header', async () => {
    const { app } = whoamiApp([{ profile: PROFILE }], production);

    const res = await app.request('/whoami', {
      headers: { 'X-API-Key': generateApiToken().token },
    });

    expect(await res.json()).toEqual({ profile: PROFILE, authType: 'token' });
  });

  it('accepts the application key from the query string', async () => {
    const { app, select } = whoamiApp([], production);

    const res = await app.request('/whoami?key=test-application-key');

    expect(await res.json()).toEqual({ profile: null, authType: 'application_key' });
    expect(select).not.toHaveBeenCalled();
  });

  it('ignores a wrong application key', async () => {
    const { app } = whoamiApp([], production);

    const res = await app.request('/whoami?key=not-the-key');

    expect(await res.json()).toEqual({ profile: null, authType: null });
  });

  it('ignores the application key when none is configured', async () => {
    const { app } = whoamiApp([], { nodeEnv: 'production' });

    const res = await app.request('/whoami?key=test-application-key');

    expect(await res.json()).toEqual({ profile: null, authType: null });
  });

  it('honors the test profile header only in test mode', async () => {
    const headers = { 'x-test-profile-id': PROFILE.id, 'x-test-username': 'field.tech' };

    const inTest = whoamiApp([], { nodeEnv: 'test' });
    const testRes = await inTest.app.request('/whoami', { headers });
    expect(await testRes.json()).toEqual({
      profile: { id: PROFILE.id, edipi: 0, username: 'field.tech', email: 'field.tech@example.com' },
      authType: 'token',
    });

    const inProduction = whoamiApp([], production);
    const prodRes = await inProduction.app.request('/whoami', { headers });
    expect(await prodRes.json()).toEqual({ profile: null, authType: null });
  });
});

describe('guards', () => {
  it('requireProfile rejects anonymous and application key callers', async () => {
    const { app } = whoamiApp([], production);

    const res = await app.request('/profile-only?key=test-application-key', { method: 'POST' });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: 'UNAUTHENTICATED', message: 'Authentication required' },
    });
  });

  it('requireProfileOrApplicationKey admits the application key', async () => {
    const { app } = whoamiApp([], production);

    const anonymous = await app.request('/measurements', { method: 'POST' });
    const keyed = await app.request('/measurements?key=test-application-key', { method: 'POST' });

    expect(anonymous.status).toBe(401);
    expect(keyed.status).toBe(200);
  });
});
