import type {
  Calendar,
  CalendarProvider,
  CalendarSettingsUpdate,
  CalendarSyncStatus,
  CalendarVisibility,
  NewCalendar
} from '@calsync/shared';
import { db } from './shared.js';

export interface CalendarRow {
  id: number;
  user_id: number;
  source_id: string | null;
  provider: CalendarProvider;
  summary: string;
  time_zone: string;
  description: string | null;
  color: string | null;
  visibility: CalendarVisibility;
  redaction: string | null;
  sync_status: CalendarSyncStatus;
  sync_cursor: string | null;
  last_full_sync_at: Date | null;
  last_checked_at: Date | null;
  deleted_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export function calendarRowToCalendar(row: CalendarRow): Calendar {
  return {
    id: row.id,
    userId: row.user_id,
    sourceId: row.source_id,
    provider: row.provider,
    summary: row.summary,
    timeZone: row.time_zone,
    description: row.description,
    color: row.color,
    visibility: row.visibility,
    redaction: row.redaction,
    sync: {
      status: row.sync_status,
      cursor: row.sync_cursor,
      lastFullSyncAt: row.last_full_sync_at,
      lastCheckedAt: row.last_checked_at
    },
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function calendarValues(input: NewCalendar): unknown[] {
  return [
    input.userId,
    input.sourceId,
    input.provider,
    input.summary,
    input.timeZone,
    input.description,
    input.color,
    input.visibility,
    input.redaction,
    input.sync.status,
    input.sync.cursor,
    input.sync.lastFullSyncAt,
    input.sync.lastCheckedAt
  ];
}

export async function listCalendarsByUser(userId: number): Promise<Calendar[]> {
  const result = await db.query<CalendarRow>(
    `SELECT * FROM calendars
      WHERE user_id = $1 AND deleted_at IS NULL
      ORDER BY id`,
    [userId]
  );
  return result.rows.map(calendarRowToCalendar);
}

export async function findCalendarById(calendarId: number): Promise<Calendar | null> {
  const result = await db.query<CalendarRow>('SELECT * FROM calendars WHERE id = $1 AND deleted_at IS NULL', [
    calendarId
  ]);
  return result.rows[0] ? calendarRowToCalendar(result.rows[0]) : null;
}

export async function findCalendarBySource(
  userId: number,
  sourceId: string,
  options: { includeDeleted?: boolean } = {}
): Promise<(Calendar & { deleted: boolean }) | null> {
  const result = await db.query<CalendarRow>(
    `SELECT * FROM calendars
      WHERE user_id = $1 AND source_id = $2${options.includeDeleted ? '' : ' AND deleted_at IS NULL'}`,
    [userId, sourceId]
  );
  const row = result.rows[0];
  return row ? { ...calendarRowToCalendar(row), deleted: row.deleted_at !== null } : null;
}

export async function createCalendar(input: NewCalendar): Promise<Calendar> {
  const result = await db.query<CalendarRow>(
    `INSERT INTO calendars (
       user_id, source_id, provider, summary, time_zone, description, color, visibility, redaction,
       sync_status, sync_cursor, last_full_sync_at, last_checked_at
     )
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
     RETURNING *`,
    calendarValues(input)
  );
  const row = result.rows[0];
  if (!row) {
    throw new Error('Failed to create calendar');
  }
  return calendarRowToCalendar(row);
}

/** Brings a soft-deleted calendar back with fresh metadata and sync state. */
export async function reviveCalendar(calendarId: number, input: NewCalendar): Promise<Calendar> {
  const [, ...values] = calendarValues(input);
  const result = await db.query<CalendarRow>(
    `UPDATE calendars
        SET source_id = $2,
            provider = $3,
            summary = $4,
            time_zone = $5,
            description = $6,
            color = $7,
            visibility = $8,
            redaction = $9,
            sync_status = $10,
            sync_cursor = $11,
            last_full_sync_at = $12,
            last_checked_at = $13,
            deleted_at = NULL,
            updated_at = NOW()
      WHERE id = $1
      RETURNING *`,
    [calendarId, ...values]
  );
  const row = result.rows[0];
  if (!row) {
    throw new Error(`Calendar ${calendarId} not found`);
  }
  return calendarRowToCalendar(row);
}

export async function updateCalendarSettings(
  calendarId: number,
  patch: CalendarSettingsUpdate
): Promise<Calendar | null> {
  const assignments: string[] = [];
  const values: unknown[] = [calendarId];

  if (patch.visibility !== undefined) {
    values.push(patch.visibility);
    assignments.push(`visibility = $${values.length}`);
  }
  if (patch.redaction !== undefined) {
    values.push(patch.redaction);
    assignments.push(`redaction = $${values.length}`);
  }
  if (patch.color !== undefined) {
    values.push(patch.color);
    assignments.push(`color = $${values.length}`);
  }

  if (assignments.length === 0) {
    return findCalendarById(calendarId);
  }

  const result = await db.query<CalendarRow>(
    `UPDATE calendars
        SET ${assignments.join(', ')}, updated_at = NOW()
      WHERE id = $1 AND deleted_at IS NULL
      RETURNING *`,
    values
  );
  return result.rows[0] ? calendarRowToCalendar(result.rows[0]) : null;
}

/** Marks the calendar deleted and removes its events in one transaction. */
export async function softDeleteCalendar(calendarId: number): Promise<boolean> {
  return db.withTransaction(async (client) => {
    const result = await client.query<{ id: number }>(
      `UPDATE calendars
          SET deleted_at = NOW(), sync_cursor = NULL, updated_at = NOW()
        WHERE id = $1 AND deleted_at IS NULL
        RETURNING id`,
      [calendarId]
    );
    if (!result.rows[0]) {
      return false;
    }
    await client.query('DELETE FROM calendar_events WHERE calendar_id = $1', [calendarId]);
    return true;
  });
}

export async function clearSyncCursor(calendarId: number): Promise<void> {
  await db.query('UPDATE calendars SET sync_cursor = NULL, updated_at = NOW() WHERE id = $1', [calendarId]);
}

export async function completeSyncPass(
  calendarId: number,
  update: {
    status: CalendarSyncStatus;
    cursor: string | null;
    lastFullSyncAt?: Date;
    lastCheckedAt: Date;
  }
): Promise<void> {
  await db.query(
    `UPDATE calendars
        SET sync_status = $2,
            sync_cursor = $3,
            last_full_sync_at = COALESCE($4, last_full_sync_at),
            last_checked_at = $5,
            updated_at = NOW()
      WHERE id = $1`,
    [calendarId, update.status, update.cursor, update.lastFullSyncAt ?? null, update.lastCheckedAt]
  );
}
