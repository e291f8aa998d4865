import { describe, it, expect, vi } from 'vitest';

vi.mock('@/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
  setLogLevel: vi.fn(),
}));

import { NotFoundError } from '@/errors/apiErrors';
import {
  createPlotConfiguration,
  deletePlotConfiguration,
  getPlotConfiguration,
  listPlotConfigurations,
  updatePlotConfiguration,
} from '@/services/plotConfiguration.service';
import { logger } from '@/utils/logger';
import { createMockSql } from '../../helpers/db';

const PROJECT = '5e6f7a8b-9c0d-4e1f-8a2b-3c4d5e6f7a8b';
const PLOT = 'c1d2e3f4-a5b6-4c7d-8e9f-0a1b2c3d4e5f';
const PROFILE = 'b3c4d5e6-f7a8-4b9c-8d0e-1f2a3b4c5d6e';
const TS_A = '0b7e3c1a-4f2d-4e6b-9a8c-1d2e3f4a5b6c';
const TS_B = '9c8d7e6f-5a4b-4c3d-8e2f-1a0b9c8d7e6f';
const NOW = new Date('2024-06-01T08:00:00Z');

const storedPlot = {
  id: PLOT,
  slug: 'upstream-piezometers',
  name: 'Upstream piezometers',
  project_id: PROJECT,
  timeseries_id: [TS_B],
  creator: PROFILE,
  create_date: NOW,
  updater: PROFILE,
  update_date: NOW,
};

describe('plotConfiguration.service', () => {
  describe('updatePlotConfiguration()', () => {
    it('renames, reconciles and re-reads after commit', async () => {
      const mock = createMockSql();
      mock.queue([{ id: PLOT }], [{ member: TS_A }], [{ member: TS_B }], [storedPlot]);

      const result = await updatePlotConfiguration(mock.sql, {
        id: PLOT,
        project_id: PROJECT,
        name: 'Upstream piezometers',
        timeseries_id: [TS_B],
        updater: PROFILE,
        update_date: NOW,
      });

      expect(result).toEqual(storedPlot);
      expect(mock.commits).toBe(1);
      expect(mock.queries.map((q) => q.inTransaction)).toEqual([true, true, true, false]);
      expect(mock.queries[0].text).toBe(
        'UPDATE plot_configuration SET name = $3, updater = $4, update_date = $5 WHERE project_id = $1 AND id = $2 RETURNING id'
      );
      expect(mock.queries[0].params).toEqual([PROJECT, PLOT, 'Upstream piezometers', PROFILE, NOW]);
      expect(mock.queries[1].params).toEqual([PLOT, [TS_B]]);
      expect(mock.queries[3].params).toEqual([PROJECT, PLOT]);
      expect(logger.debug).toHaveBeenCalledWith('Plot configuration timeseries reconciled', {
        plotConfigurationId: PLOT,
        deleted: 1,
        inserted: 1,
      });
    });

    it('clears every timeseries for an empty list', async () => {
      const mock = createMockSql();
      mock.queue([{ id: PLOT }], [{ member: TS_A }, { member: TS_B }], [
        { ...storedPlot, timeseries_id: [] },
      ]);

      const result = await updatePlotConfiguration(mock.sql, {
        id: PLOT,
        project_id: PROJECT,
        name: 'Upstream piezometers',
        timeseries_id: [],
        updater: PROFILE,
        update_date: NOW,
      });

      expect(result.timeseries_id).toEqual([]);
      expect(mock.queries).toHaveLength(3);
      expect(mock.queries[1].text.startsWith('DELETE FROM plot_configuration_timeseries')).toBe(true);
      expect(mock.queries[2].text.startsWith('SELECT')).toBe(true);
    });

    it('throws NotFoundError and rolls back when no row matches', async () => {
      const mock = createMockSql();
      mock.queue([]);

      await expect(
        updatePlotConfiguration(mock.sql, {
          id: PLOT,
          project_id: PROJECT,
          name: 'Gone',
          timeseries_id: [TS_A],
          updater: PROFILE,
          update_date: NOW,
        })
      ).rejects.toBeInstanceOf(NotFoundError);

      expect(mock.rollbacks).toBe(1);
      expect(mock.queries).toHaveLength(1);
    });

    it('keeps the old set when reconciliation fails', async () => {
      const mock = createMockSql();
      mock.queue([{ id: PLOT }]);
      mock.fail(new Error('connection terminated'));

      await expect(
        updatePlotConfiguration(mock.sql, {
          id: PLOT,
          project_id: PROJECT,
          name: 'Upstream piezometers',
          timeseries_id: [TS_A],
          updater: PROFILE,
          update_date: NOW,
        })
      ).rejects.toThrow('connection terminated');

      expect(mock.rollbacks).toBe(1);
      expect(mock.queries).toHaveLength(2);
    });
  });

  describe('createPlotConfiguration()', () => {
    it('inserts the row and its timeseries in one transaction', async () => {
      const mock = createMockSql();
      mock.queue([{ id: PLOT }], [], [{ member: TS_B }], [storedPlot]);

      const result = await createPlotConfiguration(mock.sql, {
        slug: 'upstream-piezometers',
        name: 'Upstream piezometers',
        project_id: PROJECT,
        timeseries_id: [TS_B],
        creator: PROFILE,
        create_date: NOW,
      });

      expect(result).toEqual(storedPlot);
      expect(mock.commits).toBe(1);
      expect(mock.queries[0].params).toEqual([
        'upstream-piezometers',
        'Upstream piezometers',
        PROJECT,
        PROFILE,
        NOW,
      ]);
      expect(mock.queries[2].params).toEqual([PLOT, [TS_B]]);
    });
  });

  describe('reads and deletes', () => {
    it('lists by project ordered by name', async () => {
      const mock = createMockSql();
      mock.queue([storedPlot]);

      await expect(listPlotConfigurations(mock.sql, PROJECT)).resolves.toEqual([storedPlot]);
      expect(mock.queries[0].text).toContain('FROM v_plot_configuration WHERE project_id = $1 ORDER BY name');
    });

    it('throws NotFoundError for a missing configuration', async () => {
      const mock = createMockSql();

      await expect(getPlotConfiguration(mock.sql, PROJECT, PLOT)).rejects.toThrow(
        `plot configuration ${PLOT} not found`
      );
    });

    it('throws NotFoundError when nothing was deleted', async () => {
      const mock = createMockSql();
      mock.queue([]);

      await expect(deletePlotConfiguration(mock.sql, PROJECT, PLOT)).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });
});
