import { InstrumentationHttpClient } from '../http.js';
import type {
  CreatePlotConfigurationInput,
  PlotConfiguration,
  UpdatePlotConfigurationInput,
} from '../types.js';
import { mapAudit, type AuditEnvelope } from './wire.js';

interface PlotConfigurationEnvelope extends AuditEnvelope {
  id: string;
  slug: string;
  name: string;
  project_id: string;
  timeseries_id: string[] | null;
}

function mapPlotConfiguration(row: PlotConfigurationEnvelope): PlotConfiguration {
  return {
    id: row.id,
    slug: row.slug,
    name: row.name,
    projectId: row.project_id,
    timeseriesIds: row.timeseries_id ?? [],
    ...mapAudit(row),
  };
}

function basePath(projectId: string): string {
  return `/projects/${encodeURIComponent(projectId)}/plot_configurations`;
}

export async function listPlotConfigurationsMethod(
  http: InstrumentationHttpClient,
  projectId: string,
): Promise<PlotConfiguration[]> {
  const rows = await http.request<PlotConfigurationEnvelope[]>({
    method: 'GET',
    path: basePath(projectId),
  });
  return rows.map(mapPlotConfiguration);
}

export async function getPlotConfigurationMethod(
  http: InstrumentationHttpClient,
  projectId: string,
  plotConfigurationId: string,
): Promise<PlotConfiguration> {
  const row = await http.request<PlotConfigurationEnvelope>({
    method: 'GET',
    path: `${basePath(projectId)}/${encodeURIComponent(plotConfigurationId)}`,
  });
  return mapPlotConfiguration(row);
}

export async function createPlotConfigurationMethod(
  http: InstrumentationHttpClient,
  input: CreatePlotConfigurationInput,
): Promise<PlotConfiguration> {
  const row = await http.request<PlotConfigurationEnvelope>({
    method: 'POST',
    path: basePath(input.projectId),
    body: {
      name: input.name,
      timeseries_id: input.timeseriesIds ?? [],
    },
  });
  return mapPlotConfiguration(row);
}

export async function updatePlotConfigurationMethod(
  http: InstrumentationHttpClient,
  input: UpdatePlotConfigurationInput,
): Promise<PlotConfiguration> {
  const row = await http.request<PlotConfigurationEnvelope>({
    method: 'PUT',
    path: `${basePath(input.projectId)}/${encodeURIComponent(input.id)}`,
    body: {
      id: input.id,
      name: input.name,
      timeseries_id: input.timeseriesIds,
    },
  });
  return mapPlotConfiguration(row);
}

export async function deletePlotConfigurationMethod(
  http: InstrumentationHttpClient,
  projectId: string,
  plotConfigurationId: string,
): Promise<void> {
  await http.request<{ id: string }>({
    method: 'DELETE',
    path: `${basePath(projectId)}/${encodeURIComponent(plotConfigurationId)}`,
  });
}
