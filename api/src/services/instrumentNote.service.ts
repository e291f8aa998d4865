/**
 * Instrument Note Service
 */

import { withTransaction, type Sql } from '@/db/client';
import { NotFoundError } from '@/errors/apiErrors';
import type { InstrumentNote } from '@/types/models';
import type { CreatedStamp, UpdatedStamp } from '@/utils/audit';

const LIST_INSTRUMENT_NOTES_SQL = `
  SELECT N.id,
         N.instrument_id,
         N.title,
         N.body,
         N.time,
         N.creator,
         N.create_date,
         N.updater,
         N.update_date
  FROM instrument_note N
`;

const NOTE_COLUMNS = 'id, instrument_id, title, body, time, creator, create_date, updater, update_date';

export interface NewInstrumentNote extends CreatedStamp {
  instrument_id: string;
  title: string;
  body: string;
  time: Date;
}

export interface InstrumentNoteChanges extends UpdatedStamp {
  id: string;
  title: string;
  body: string;
  time: Date;
}

export async function listInstrumentNotes(sql: Sql): Promise<InstrumentNote[]> {
  return await sql.unsafe<InstrumentNote[]>(`${LIST_INSTRUMENT_NOTES_SQL} ORDER BY N.time DESC`);
}

export async function listInstrumentNotesForInstrument(
  sql: Sql,
  instrumentId: string
): Promise<InstrumentNote[]> {
  return await sql.unsafe<InstrumentNote[]>(
    `${LIST_INSTRUMENT_NOTES_SQL} WHERE N.instrument_id = $1 ORDER BY N.time DESC`,
    [instrumentId]
  );
}

export async function getInstrumentNote(sql: Sql, noteId: string): Promise<InstrumentNote> {
  const [note] = await sql.unsafe<InstrumentNote[]>(`${LIST_INSTRUMENT_NOTES_SQL} WHERE N.id = $1`, [
    noteId,
  ]);
  if (!note) {
    throw new NotFoundError('instrument note', noteId);
  }
  return note;
}

/**
 * Insert every note in one transaction and return the stored rows
 */
export async function createInstrumentNotes(
  sql: Sql,
  notes: NewInstrumentNote[]
): Promise<InstrumentNote[]> {
  if (notes.length === 0) return [];

  return await withTransaction(sql, async (tx) => {
    const created: InstrumentNote[] = [];
    for (const n of notes) {
      const [row] = await tx.unsafe<InstrumentNote[]>(
        `INSERT INTO instrument_note (instrument_id, title, body, time, creator, create_date)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${NOTE_COLUMNS}`,
        [n.instrument_id, n.title, n.body, n.time, n.creator, n.create_date]
      );
      created.push(row);
    }
    return created;
  });
}

export async function updateInstrumentNote(
  sql: Sql,
  changes: InstrumentNoteChanges
): Promise<InstrumentNote> {
  const [note] = await sql.unsafe<InstrumentNote[]>(
    `UPDATE instrument_note
     SET title = $2, body = $3, time = $4, updater = $5, update_date = $6
     WHERE id = $1
     RETURNING ${NOTE_COLUMNS}`,
    [changes.id, changes.title, changes.body, changes.time, changes.updater, changes.update_date]
  );
  if (!note) {
    throw new NotFoundError('instrument note', changes.id);
  }
  return note;
}

export async function deleteInstrumentNote(sql: Sql, noteId: string): Promise<void> {
  const deleted = await sql.unsafe<{ id: string }[]>(
    'DELETE FROM instrument_note WHERE id = $1 RETURNING id',
    [noteId]
  );
  if (deleted.length === 0) {
    throw new NotFoundError('instrument note', noteId);
  }
}
