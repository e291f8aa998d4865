/**
 * Application Factory
 *
 * Builds the Hono app around an explicit database handle and config.
 * index.ts serves it; tests call createApp with a mock handle.
 */

import { Hono } from 'hono';
import type { Db, Sql } from '@/db/client';
import { createAuthResolver } from '@/middleware/auth';
import { createCorsMiddleware } from '@/middleware/cors';
import { handleError, type ErrorResponse } from '@/middleware/errorHandler';
import { securityHeaders } from '@/middleware/securityHeaders';
import { createAwareRoutes } from '@/routes/aware';
import { createComputedTimeseriesRoutes } from '@/routes/computedTimeseries';
import { createDomainRoutes } from '@/routes/domains';
import { createInstrumentGroupRoutes } from '@/routes/instrumentGroups';
import { createInstrumentNoteRoutes } from '@/routes/instrumentNotes';
import { createInstrumentRoutes } from '@/routes/instruments';
import { createInstrumentStatusRoutes } from '@/routes/instrumentStatus';
import { createPlotConfigurationRoutes } from '@/routes/plotConfigurations';
import { createProfileRoutes } from '@/routes/profile';
import { createProjectRoutes } from '@/routes/projects';
import { createTimeseriesRoutes } from '@/routes/timeseries';
import type { HonoEnv } from '@/types/hono';
import type { AppConfig } from '@/utils/config';

export const API_VERSION = '1.0.0';

export interface AppDeps {
  sql: Sql;
  db: Db;
  config: Pick<AppConfig, 'nodeEnv' | 'applicationKey' | 'corsOrigin' | 'routePrefix'>;
}

export function createApp({ sql, db, config }: AppDeps) {
  const app = new Hono<HonoEnv>();

  // Global middleware chain
  app.use('*', securityHeaders);
  app.use('*', createCorsMiddleware(config.corsOrigin));
  app.use('*', createAuthResolver({ db, config }));

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
    });
  });

  const deps = { sql };
  const api = new Hono<HonoEnv>();
  api.route('/', createDomainRoutes(deps));
  api.route('/', createProfileRoutes(deps));
  api.route('/', createProjectRoutes(deps));
  api.route('/', createPlotConfigurationRoutes(deps));
  // Notes and status before instruments: /instruments/notes is not an instrument id
  api.route('/', createInstrumentNoteRoutes(deps));
  api.route('/', createInstrumentStatusRoutes(deps));
  api.route('/', createInstrumentRoutes(deps));
  api.route('/', createInstrumentGroupRoutes(deps));
  api.route('/', createTimeseriesRoutes(deps));
  api.route('/', createComputedTimeseriesRoutes(deps));
  api.route('/', createAwareRoutes(deps));

  app.route(config.routePrefix || '/', api);

  app.onError(handleError);

  app.notFound((c) => {
    return c.json<ErrorResponse>(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
        },
      },
      404
    );
  });

  return app;
}
