/**
 * Monitoring Domain Types
 *
 * Row shapes returned by the services. Field names match the columns
 * of the views in sql/init.sql and are serialized to clients as-is.
 */

export interface AuditInfo {
  creator: string;
  create_date: Date;
  updater: string | null;
  update_date: Date | null;
}

export interface IdAndSlug {
  id: string;
  slug: string;
}

export interface GeoJsonPoint {
  type: 'Point';
  coordinates: [number, number] | [number, number, number];
}

export interface Project extends AuditInfo {
  id: string;
  federal_id: string | null;
  office_id: string | null;
  image: string | null;
  slug: string;
  name: string;
  timeseries: string[];
  instrument_count: number;
  instrument_group_count: number;
}

export interface Instrument extends AuditInfo {
  id: string;
  project_id: string | null;
  slug: string;
  name: string;
  type_id: string;
  type: string;
  status_id: string | null;
  status: string | null;
  status_time: Date | null;
  station: number | null;
  offset: number | null;
  geometry: GeoJsonPoint;
  groups: string[];
}

export interface InstrumentGroup extends AuditInfo {
  id: string;
  slug: string;
  name: string;
  description: string;
  project_id: string | null;
  instrument_count: number;
  timeseries_count: number;
}

export interface InstrumentNote extends AuditInfo {
  id: string;
  instrument_id: string;
  title: string;
  body: string;
  time: Date;
}

export interface InstrumentStatus {
  id: string;
  instrument_id: string;
  status_id: string;
  status: string;
  time: Date;
}

export interface PlotConfiguration extends AuditInfo {
  id: string;
  slug: string;
  name: string;
  project_id: string;
  timeseries_id: string[];
}

export interface Measurement {
  time: Date;
  value: number;
}

export interface MeasurementCollection {
  timeseries_id: string;
  items: Measurement[];
}

export interface ComputedTimeseries extends MeasurementCollection {
  instrument_id: string;
}

export interface TimeWindow {
  after: Date;
  before: Date;
}

export type DomainGroup = 'instrument_type' | 'parameter' | 'unit' | 'status' | 'role';

export interface Domain {
  id: string;
  group: DomainGroup;
  value: string;
  description: string | null;
}

export interface AwareParameter {
  id: string;
  key: string;
  parameter_id: string;
  unit_id: string;
}

export interface AwarePlatformParameterConfig {
  instrument_id: string;
  aware_id: string;
  aware_parameters: Record<string, string | null>;
}
