import { InstrumentationValidationError } from '../errors.js';
import { InstrumentationHttpClient } from '../http.js';
import type {
  CreateProjectInput,
  IdAndSlug,
  Project,
  RequestControl,
  UpdateProjectInput,
} from '../types.js';
import { mapAudit, type AuditEnvelope } from './wire.js';

export interface ProjectEnvelope extends AuditEnvelope {
  id: string;
  federal_id: string | null;
  office_id: string | null;
  image: string | null;
  slug: string;
  name: string;
  timeseries: string[] | null;
  instrument_count: number;
  instrument_group_count: number;
}

export function mapProject(row: ProjectEnvelope): Project {
  return {
    id: row.id,
    federalId: row.federal_id,
    officeId: row.office_id,
    image: row.image,
    slug: row.slug,
    name: row.name,
    timeseries: row.timeseries ?? [],
    instrumentCount: row.instrument_count,
    instrumentGroupCount: row.instrument_group_count,
    ...mapAudit(row),
  };
}

export async function listProjectsMethod(
  http: InstrumentationHttpClient,
  control: RequestControl = {},
): Promise<Project[]> {
  const rows = await http.request<ProjectEnvelope[]>({
    method: 'GET',
    path: '/projects',
    ...control,
  });
  return rows.map(mapProject);
}

export async function listMyProjectsMethod(http: InstrumentationHttpClient): Promise<Project[]> {
  const rows = await http.request<ProjectEnvelope[]>({
    method: 'GET',
    path: '/my_projects',
  });
  return rows.map(mapProject);
}

export async function getProjectMethod(
  http: InstrumentationHttpClient,
  projectId: string,
): Promise<Project> {
  const row = await http.request<ProjectEnvelope>({
    method: 'GET',
    path: `/projects/${encodeURIComponent(projectId)}`,
  });
  return mapProject(row);
}

export async function getProjectCountMethod(http: InstrumentationHttpClient): Promise<number> {
  const response = await http.request<{ count: number }>({
    method: 'GET',
    path: '/projects/count',
  });
  return response.count;
}

export async function createProjectsMethod(
  http: InstrumentationHttpClient,
  input: CreateProjectInput[],
): Promise<IdAndSlug[]> {
  for (const project of input) {
    if (!project.name || project.name.trim().length === 0) {
      throw new InstrumentationValidationError('project name is required', {
        status: 400,
        code: 'INVALID_ARGS',
      });
    }
  }

  return http.request<IdAndSlug[]>({
    method: 'POST',
    path: '/projects',
    body: input.map((project) => ({
      name: project.name,
      federal_id: project.federalId ?? null,
    })),
  });
}

export async function updateProjectMethod(
  http: InstrumentationHttpClient,
  input: UpdateProjectInput,
): Promise<Project> {
  const row = await http.request<ProjectEnvelope>({
    method: 'PUT',
    path: `/projects/${encodeURIComponent(input.id)}`,
    body: {
      id: input.id,
      name: input.name,
      federal_id: input.federalId ?? null,
      office_id: input.officeId ?? null,
      image: input.image ?? null,
    },
  });
  return mapProject(row);
}

export async function deleteProjectMethod(
  http: InstrumentationHttpClient,
  projectId: string,
): Promise<void> {
  await http.request<{ id: string }>({
    method: 'DELETE',
    path: `/projects/${encodeURIComponent(projectId)}`,
  });
}

export async function listProjectInstrumentNamesMethod(
  http: InstrumentationHttpClient,
  projectId: string,
): Promise<string[]> {
  return http.request<string[]>({
    method: 'GET',
    path: `/projects/${encodeURIComponent(projectId)}/instruments/names`,
  });
}
