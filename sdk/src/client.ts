import { InstrumentationHttpClient } from './http.js';
import { listDomainsMethod } from './methods/domains.js';
import {
  createInstrumentNotesMethod,
  createInstrumentsMethod,
  deleteInstrumentMethod,
  deleteInstrumentNoteMethod,
  getInstrumentMethod,
  listInstrumentNotesMethod,
  listInstrumentsMethod,
  listProjectInstrumentsMethod,
  updateInstrumentMethod,
  updateInstrumentNoteMethod,
} from './methods/instruments.js';
import {
  listComputedTimeseriesMethod,
  listMeasurementsMethod,
  upsertMeasurementsMethod,
} from './methods/measurements.js';
import {
  createPlotConfigurationMethod,
  deletePlotConfigurationMethod,
  getPlotConfigurationMethod,
  listPlotConfigurationsMethod,
  updatePlotConfigurationMethod,
} from './methods/plotConfigurations.js';
import {
  createProjectsMethod,
  deleteProjectMethod,
  getProjectCountMethod,
  getProjectMethod,
  listMyProjectsMethod,
  listProjectInstrumentNamesMethod,
  listProjectsMethod,
  updateProjectMethod,
} from './methods/projects.js';
import type {
  ComputedTimeseries,
  CreateInstrumentInput,
  CreateInstrumentNoteInput,
  CreatePlotConfigurationInput,
  CreateProjectInput,
  Domain,
  IdAndSlug,
  Instrument,
  InstrumentNote,
  InstrumentationClientConfig,
  ListComputedTimeseriesInput,
  ListMeasurementsInput,
  MeasurementCollection,
  MeasurementCollectionInput,
  PlotConfiguration,
  Project,
  RequestControl,
  UpdateInstrumentInput,
  UpdateInstrumentNoteInput,
  UpdatePlotConfigurationInput,
  UpdateProjectInput,
} from './types.js';

function asList<T>(input: T | T[]): T[] {
  return Array.isArray(input) ? input : [input];
}

export class InstrumentationClient {
  private readonly http: InstrumentationHttpClient;

  constructor(config: InstrumentationClientConfig) {
    const token = config.token?.trim();
    const applicationKey = config.applicationKey?.trim();
    if (!token && !applicationKey) {
      throw new Error('InstrumentationClient requires a token or an applicationKey');
    }

    this.http = new InstrumentationHttpClient({ ...config, token, applicationKey });
  }

  async listDomains(): Promise<Domain[]> {
    return listDomainsMethod(this.http);
  }

  async listProjects(control?: RequestControl): Promise<Project[]> {
    return listProjectsMethod(this.http, control);
  }

  async listMyProjects(): Promise<Project[]> {
    return listMyProjectsMethod(this.http);
  }

  async getProject(projectId: string): Promise<Project> {
    return getProjectMethod(this.http, projectId);
  }

  async countProjects(): Promise<number> {
    return getProjectCountMethod(this.http);
  }

  async createProjects(input: CreateProjectInput | CreateProjectInput[]): Promise<IdAndSlug[]> {
    return createProjectsMethod(this.http, asList(input));
  }

  async updateProject(input: UpdateProjectInput): Promise<Project> {
    return updateProjectMethod(this.http, input);
  }

  async deleteProject(projectId: string): Promise<void> {
    return deleteProjectMethod(this.http, projectId);
  }

  async listProjectInstrumentNames(projectId: string): Promise<string[]> {
    return listProjectInstrumentNamesMethod(this.http, projectId);
  }

  async listInstruments(projectId?: string): Promise<Instrument[]> {
    return projectId
      ? listProjectInstrumentsMethod(this.http, projectId)
      : listInstrumentsMethod(this.http);
  }

  async getInstrument(instrumentId: string): Promise<Instrument> {
    return getInstrumentMethod(this.http, instrumentId);
  }

  async createInstruments(
    input: CreateInstrumentInput | CreateInstrumentInput[],
  ): Promise<IdAndSlug[]> {
    return createInstrumentsMethod(this.http, asList(input));
  }

  async updateInstrument(input: UpdateInstrumentInput): Promise<Instrument> {
    return updateInstrumentMethod(this.http, input);
  }

  async deleteInstrument(instrumentId: string): Promise<void> {
    return deleteInstrumentMethod(this.http, instrumentId);
  }

  async listInstrumentNotes(instrumentId?: string): Promise<InstrumentNote[]> {
    return listInstrumentNotesMethod(this.http, instrumentId);
  }

  async createInstrumentNotes(
    input: CreateInstrumentNoteInput | CreateInstrumentNoteInput[],
  ): Promise<InstrumentNote[]> {
    return createInstrumentNotesMethod(this.http, asList(input));
  }

  async updateInstrumentNote(input: UpdateInstrumentNoteInput): Promise<InstrumentNote> {
    return updateInstrumentNoteMethod(this.http, input);
  }

  async deleteInstrumentNote(noteId: string): Promise<void> {
    return deleteInstrumentNoteMethod(this.http, noteId);
  }

  async listPlotConfigurations(projectId: string): Promise<PlotConfiguration[]> {
    return listPlotConfigurationsMethod(this.http, projectId);
  }

  async getPlotConfiguration(
    projectId: string,
    plotConfigurationId: string,
  ): Promise<PlotConfiguration> {
    return getPlotConfigurationMethod(this.http, projectId, plotConfigurationId);
  }

  async createPlotConfiguration(input: CreatePlotConfigurationInput): Promise<PlotConfiguration> {
    return createPlotConfigurationMethod(this.http, input);
  }

  async updatePlotConfiguration(input: UpdatePlotConfigurationInput): Promise<PlotConfiguration> {
    return updatePlotConfigurationMethod(this.http, input);
  }

  async deletePlotConfiguration(projectId: string, plotConfigurationId: string): Promise<void> {
    return deletePlotConfigurationMethod(this.http, projectId, plotConfigurationId);
  }

  async upsertMeasurements(
    input: MeasurementCollectionInput | MeasurementCollectionInput[],
    control?: RequestControl,
  ): Promise<MeasurementCollection[]> {
    return upsertMeasurementsMethod(this.http, asList(input), control);
  }

  async listMeasurements(
    input: ListMeasurementsInput,
    control?: RequestControl,
  ): Promise<MeasurementCollection> {
    return listMeasurementsMethod(this.http, input, control);
  }

  async listComputedTimeseries(
    input: ListComputedTimeseriesInput,
    control?: RequestControl,
  ): Promise<ComputedTimeseries[]> {
    return listComputedTimeseriesMethod(this.http, input, control);
  }
}
