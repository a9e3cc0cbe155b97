import type { CalendarEvent, CalendarEventVisibility, NewCalendarEvent } from '@calsync/shared';
import { db } from './shared.js';
import { listPlaceholders, valuesPlaceholders } from './sql.js';

interface CalendarEventRow {
  id: number;
  calendar_id: number;
  source_id: string;
  title: string;
  start_at: Date;
  end_at: Date;
  all_day: boolean;
  location: string | null;
  description: string | null;
  color: string | null;
  visibility: CalendarEventVisibility;
  created_at: Date;
  updated_at: Date;
}

const EVENT_COLUMNS = 10;

// Keeps each INSERT well below the 65535 bind-parameter ceiling.
const INSERT_CHUNK_SIZE = 500;

export function eventRowToEvent(row: CalendarEventRow): CalendarEvent {
  return {
    id: row.id,
    calendarId: row.calendar_id,
    sourceId: row.source_id,
    title: row.title,
    startAt: row.start_at,
    endAt: row.end_at,
    allDay: row.all_day,
    location: row.location,
    description: row.description,
    color: row.color,
    visibility: row.visibility,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function eventValues(event: NewCalendarEvent): unknown[] {
  return [
    event.calendarId,
    event.sourceId,
    event.title,
    event.startAt,
    event.endAt,
    event.allDay,
    event.location,
    event.description,
    event.color,
    event.visibility
  ];
}

export async function listEventsByCalendar(calendarId: number): Promise<CalendarEvent[]> {
  const result = await db.query<CalendarEventRow>(
    'SELECT * FROM calendar_events WHERE calendar_id = $1 ORDER BY start_at, id',
    [calendarId]
  );
  return result.rows.map(eventRowToEvent);
}

/** Events overlapping [start, end], inclusive on both ends. */
export async function listEventsInRange(calendarIds: number[], start: Date, end: Date): Promise<CalendarEvent[]> {
  if (calendarIds.length === 0) {
    return [];
  }
  const result = await db.query<CalendarEventRow>(
    `SELECT * FROM calendar_events
      WHERE calendar_id IN (${listPlaceholders(calendarIds.length, 2)})
        AND start_at <= $2
        AND end_at >= $1
      ORDER BY start_at, id`,
    [start, end, ...calendarIds]
  );
  return result.rows.map(eventRowToEvent);
}

/**
 * Batched insert. A row whose (calendar, source id) already exists is
 * overwritten, so replaying a batch never duplicates events.
 */
export async function createEvents(events: NewCalendarEvent[]): Promise<number> {
  let stored = 0;
  for (let offset = 0; offset < events.length; offset += INSERT_CHUNK_SIZE) {
    const chunk = events.slice(offset, offset + INSERT_CHUNK_SIZE);
    const result = await db.query(
      `INSERT INTO calendar_events (
         calendar_id, source_id, title, start_at, end_at, all_day, location, description, color, visibility
       )
       VALUES ${valuesPlaceholders(chunk.length, EVENT_COLUMNS)}
       ON CONFLICT (calendar_id, source_id) DO UPDATE
         SET title = EXCLUDED.title,
             start_at = EXCLUDED.start_at,
             end_at = EXCLUDED.end_at,
             all_day = EXCLUDED.all_day,
             location = EXCLUDED.location,
             description = EXCLUDED.description,
             color = EXCLUDED.color,
             visibility = EXCLUDED.visibility,
             updated_at = NOW()`,
      chunk.flatMap(eventValues)
    );
    stored += result.rowCount ?? 0;
  }
  return stored;
}

/** Updates rows by local id inside one transaction. */
export async function updateEvents(events: CalendarEvent[]): Promise<number> {
  if (events.length === 0) {
    return 0;
  }
  return db.withTransaction(async (client) => {
    let updated = 0;
    for (const event of events) {
      const result = await client.query(
        `UPDATE calendar_events
            SET title = $2,
                start_at = $3,
                end_at = $4,
                all_day = $5,
                location = $6,
                description = $7,
                color = $8,
                visibility = $9,
                updated_at = NOW()
          WHERE id = $1`,
        [
          event.id,
          event.title,
          event.startAt,
          event.endAt,
          event.allDay,
          event.location,
          event.description,
          event.color,
          event.visibility
        ]
      );
      updated += result.rowCount ?? 0;
    }
    return updated;
  });
}

export async function deleteEventBySource(calendarId: number, sourceId: string): Promise<boolean> {
  const result = await db.query('DELETE FROM calendar_events WHERE calendar_id = $1 AND source_id = $2', [
    calendarId,
    sourceId
  ]);
  return (result.rowCount ?? 0) > 0;
}
