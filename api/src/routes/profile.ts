/**
 * Profile Routes
 */

import { Hono } from 'hono';
import type { HonoEnv, RouteDeps } from '@/types/hono';
import { currentProfile, requireProfile } from '@/middleware/auth';
import { listMyProjects } from '@/services/project.service';

export function createProfileRoutes({ sql }: RouteDeps) {
  const profile = new Hono<HonoEnv>();

  /**
   * GET /my_profile
   */
  profile.get('/my_profile', requireProfile, (c) => {
    return c.json(currentProfile(c));
  });

  /**
   * GET /my_projects
   *
   * Projects the caller holds a role on
   */
  profile.get('/my_projects', requireProfile, async (c) => {
    return c.json(await listMyProjects(sql, currentProfile(c).id));
  });

  return profile;
}
