import { describe, it, expect } from 'vitest';
import { createTestApp, createTestAuthHeaders, TEST_PROFILE_ID } from '../../helpers/app';

const GROUP = '8b7a6958-4736-4251-9e0f-dcba98765432';
const INSTRUMENT = '5d4c3b2a-1908-4776-a655-44332211aabb';

describe('instrument group routes', () => {
  it('creates groups with slugs that avoid existing ones', async () => {
    const { app, mock } = createTestApp();
    const row = {
      id: GROUP,
      slug: 'north-levee-1',
      name: 'North levee',
      description: '',
      project_id: null,
      instrument_count: 0,
      timeseries_count: 0,
    };
    mock.queue([{ slug: 'north-levee' }], [row]);

    const res = await app.request('/v1/instrument_groups', {
      method: 'POST',
      headers: createTestAuthHeaders(),
      body: JSON.stringify({ name: 'North levee' }),
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual([row]);
    expect(mock.queries[1].params).toEqual([
      'north-levee-1',
      'North levee',
      '',
      TEST_PROFILE_ID,
      expect.any(Date),
      null,
    ]);
  });

  it('adds an instrument to a group', async () => {
    const { app, mock } = createTestApp();

    const res = await app.request(`/v1/instrument_groups/${GROUP}/instruments/${INSTRUMENT}`, {
      method: 'POST',
      headers: createTestAuthHeaders(),
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ instrument_group_id: GROUP, instrument_id: INSTRUMENT });
    expect(mock.queries[0].text).toMatch(/ON CONFLICT DO NOTHING$/);
    expect(mock.queries[0].params).toEqual([GROUP, INSTRUMENT]);
  });

  it('returns 404 when deleting an unknown group', async () => {
    const { app } = createTestApp();

    const res = await app.request(`/v1/instrument_groups/${GROUP}`, {
      method: 'DELETE',
      headers: createTestAuthHeaders(),
    });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: `instrument group ${GROUP} not found` },
    });
  });
});
