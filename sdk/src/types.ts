export interface InstrumentationClientConfig {
  /** Profile token, sent as `Authorization: Bearer` */
  token?: string;
  /** Application key, sent as `?key=` when no token is configured */
  applicationKey?: string;
  /** API root including its route prefix, e.g. `https://monitoring.example.com/v1` */
  baseUrl?: string;
  fetch?: typeof globalThis.fetch;
  defaultHeaders?: Record<string, string>;
  timeoutMs?: number;
}

/** ISO-8601 string or Date; Dates are sent as ISO strings */
export type TimeInput = string | Date;

export interface RequestControl {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface Audit {
  creator: string;
  createDate: string;
  updater: string | null;
  updateDate: string | null;
}

export interface IdAndSlug {
  id: string;
  slug: string;
}

export type DomainGroup = 'instrument_type' | 'parameter' | 'unit' | 'status' | 'role';

export interface Domain {
  id: string;
  group: DomainGroup;
  value: string;
  description: string | null;
}

export interface Project extends Audit {
  id: string;
  federalId: string | null;
  officeId: string | null;
  image: string | null;
  slug: string;
  name: string;
  timeseries: string[];
  instrumentCount: number;
  instrumentGroupCount: number;
}

export interface CreateProjectInput {
  name: string;
  federalId?: string | null;
}

export interface UpdateProjectInput {
  id: string;
  name: string;
  federalId?: string | null;
  officeId?: string | null;
  image?: string | null;
}

export interface GeoJsonPoint {
  type: 'Point';
  coordinates: [number, number] | [number, number, number];
}

export interface Instrument extends Audit {
  id: string;
  projectId: string | null;
  slug: string;
  name: string;
  typeId: string;
  type: string;
  statusId: string | null;
  status: string | null;
  statusTime: string | null;
  station: number | null;
  offset: number | null;
  geometry: GeoJsonPoint;
  groups: string[];
}

export interface CreateInstrumentInput {
  name: string;
  typeId: string;
  projectId?: string | null;
  statusId: string;
  statusTime?: TimeInput;
  station?: number | null;
  offset?: number | null;
  geometry: GeoJsonPoint;
}

export interface UpdateInstrumentInput extends CreateInstrumentInput {
  id: string;
}

export interface InstrumentNote extends Audit {
  id: string;
  instrumentId: string;
  title: string;
  body: string;
  time: string;
}

export interface CreateInstrumentNoteInput {
  instrumentId: string;
  title: string;
  body?: string;
  time: TimeInput;
}

export interface UpdateInstrumentNoteInput {
  id: string;
  title: string;
  body?: string;
  time: TimeInput;
}

export interface PlotConfiguration extends Audit {
  id: string;
  slug: string;
  name: string;
  projectId: string;
  timeseriesIds: string[];
}

export interface CreatePlotConfigurationInput {
  projectId: string;
  name: string;
  timeseriesIds?: string[];
}

export interface UpdatePlotConfigurationInput {
  projectId: string;
  id: string;
  name: string;
  /** Full desired set; timeseries not listed are detached */
  timeseriesIds: string[];
}

export interface Measurement {
  time: string;
  value: number;
}

export interface MeasurementCollection {
  timeseriesId: string;
  items: Measurement[];
}

export interface MeasurementInput {
  time: TimeInput;
  value: number;
}

export interface MeasurementCollectionInput {
  timeseriesId: string;
  items: MeasurementInput[];
}

export interface ListMeasurementsInput {
  timeseriesId: string;
  /** Exclusive lower bound; defaults to one week before `before` */
  after?: TimeInput;
  /** Exclusive upper bound; defaults to now */
  before?: TimeInput;
}

export interface ComputedTimeseries extends MeasurementCollection {
  instrumentId: string;
}

export interface ListComputedTimeseriesInput {
  instrumentIds: string[];
  after?: TimeInput;
  before?: TimeInput;
  /** Bucket width in seconds */
  interval?: number;
}
