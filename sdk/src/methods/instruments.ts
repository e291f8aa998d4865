import { InstrumentationHttpClient } from '../http.js';
import type {
  CreateInstrumentInput,
  CreateInstrumentNoteInput,
  GeoJsonPoint,
  IdAndSlug,
  Instrument,
  InstrumentNote,
  UpdateInstrumentInput,
  UpdateInstrumentNoteInput,
} from '../types.js';
import { mapAudit, toIso, toIsoOptional, type AuditEnvelope } from './wire.js';

interface InstrumentEnvelope extends AuditEnvelope {
  id: string;
  project_id: string | null;
  slug: string;
  name: string;
  type_id: string;
  type: string;
  status_id: string | null;
  status: string | null;
  status_time: string | null;
  station: number | null;
  offset: number | null;
  geometry: GeoJsonPoint;
  groups: string[] | null;
}

interface InstrumentNoteEnvelope extends AuditEnvelope {
  id: string;
  instrument_id: string;
  title: string;
  body: string;
  time: string;
}

function mapInstrument(row: InstrumentEnvelope): Instrument {
  return {
    id: row.id,
    projectId: row.project_id,
    slug: row.slug,
    name: row.name,
    typeId: row.type_id,
    type: row.type,
    statusId: row.status_id,
    status: row.status,
    statusTime: row.status_time,
    station: row.station,
    offset: row.offset,
    geometry: row.geometry,
    groups: row.groups ?? [],
    ...mapAudit(row),
  };
}

function mapNote(row: InstrumentNoteEnvelope): InstrumentNote {
  return {
    id: row.id,
    instrumentId: row.instrument_id,
    title: row.title,
    body: row.body,
    time: row.time,
    ...mapAudit(row),
  };
}

function instrumentBody(input: CreateInstrumentInput) {
  return {
    name: input.name,
    type_id: input.typeId,
    project_id: input.projectId ?? null,
    status_id: input.statusId,
    status_time: toIsoOptional(input.statusTime),
    station: input.station ?? null,
    offset: input.offset ?? null,
    geometry: input.geometry,
  };
}

export async function listInstrumentsMethod(http: InstrumentationHttpClient): Promise<Instrument[]> {
  const rows = await http.request<InstrumentEnvelope[]>({
    method: 'GET',
    path: '/instruments',
  });
  return rows.map(mapInstrument);
}

export async function listProjectInstrumentsMethod(
  http: InstrumentationHttpClient,
  projectId: string,
): Promise<Instrument[]> {
  const rows = await http.request<InstrumentEnvelope[]>({
    method: 'GET',
    path: `/projects/${encodeURIComponent(projectId)}/instruments`,
  });
  return rows.map(mapInstrument);
}

export async function getInstrumentMethod(
  http: InstrumentationHttpClient,
  instrumentId: string,
): Promise<Instrument> {
  const row = await http.request<InstrumentEnvelope>({
    method: 'GET',
    path: `/instruments/${encodeURIComponent(instrumentId)}`,
  });
  return mapInstrument(row);
}

export async function createInstrumentsMethod(
  http: InstrumentationHttpClient,
  input: CreateInstrumentInput[],
): Promise<IdAndSlug[]> {
  return http.request<IdAndSlug[]>({
    method: 'POST',
    path: '/instruments',
    body: input.map(instrumentBody),
  });
}

export async function updateInstrumentMethod(
  http: InstrumentationHttpClient,
  input: UpdateInstrumentInput,
): Promise<Instrument> {
  const row = await http.request<InstrumentEnvelope>({
    method: 'PUT',
    path: `/instruments/${encodeURIComponent(input.id)}`,
    body: { id: input.id, ...instrumentBody(input) },
  });
  return mapInstrument(row);
}

export async function deleteInstrumentMethod(
  http: InstrumentationHttpClient,
  instrumentId: string,
): Promise<void> {
  await http.request<{ id: string }>({
    method: 'DELETE',
    path: `/instruments/${encodeURIComponent(instrumentId)}`,
  });
}

export async function listInstrumentNotesMethod(
  http: InstrumentationHttpClient,
  instrumentId?: string,
): Promise<InstrumentNote[]> {
  const rows = await http.request<InstrumentNoteEnvelope[]>({
    method: 'GET',
    path: instrumentId
      ? `/instruments/${encodeURIComponent(instrumentId)}/notes`
      : '/instruments/notes',
  });
  return rows.map(mapNote);
}

export async function createInstrumentNotesMethod(
  http: InstrumentationHttpClient,
  input: CreateInstrumentNoteInput[],
): Promise<InstrumentNote[]> {
  const rows = await http.request<InstrumentNoteEnvelope[]>({
    method: 'POST',
    path: '/instruments/notes',
    body: input.map((note) => ({
      instrument_id: note.instrumentId,
      title: note.title,
      body: note.body ?? '',
      time: toIso(note.time),
    })),
  });
  return rows.map(mapNote);
}

export async function updateInstrumentNoteMethod(
  http: InstrumentationHttpClient,
  input: UpdateInstrumentNoteInput,
): Promise<InstrumentNote> {
  const row = await http.request<InstrumentNoteEnvelope>({
    method: 'PUT',
    path: `/instruments/notes/${encodeURIComponent(input.id)}`,
    body: {
      id: input.id,
      title: input.title,
      body: input.body ?? '',
      time: toIso(input.time),
    },
  });
  return mapNote(row);
}

export async function deleteInstrumentNoteMethod(
  http: InstrumentationHttpClient,
  noteId: string,
): Promise<void> {
  await http.request<{ id: string }>({
    method: 'DELETE',
    path: `/instruments/notes/${encodeURIComponent(noteId)}`,
  });
}
