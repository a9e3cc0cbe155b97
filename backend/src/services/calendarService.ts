import { DateTime } from 'luxon';
import type {
  Calendar,
  CalendarEvent,
  CalendarEventsView,
  CalendarSettingsUpdate,
  CalendarWithEvents,
  StaticImportResult
} from '@calsync/shared';
import { NotFoundError, TimeRangeTooLargeError, ValidationError } from '../utils/errors.js';
import { applyRedaction, toPublicView } from './calendarSync/redaction.js';
import { getCalendarSyncEngine } from './calendarSync.js';
import { IcsParseError, parseIcsDocument, type ParsedCalendarDocument } from './ics.js';

export interface TimeRange {
  start: Date;
  end: Date;
}

/**
 * Rejects inverted windows and windows longer than `maxMonths` calendar
 * months (Jan 31 + 1 month is Feb 28/29). Equal start and end are allowed.
 */
export function validateTimeRange(range: TimeRange, maxMonths: number): void {
  if (range.start.getTime() > range.end.getTime()) {
    throw new ValidationError({ code: 'invalid_time_range', message: 'start must not be after end' });
  }
  const limit = DateTime.fromJSDate(range.start, { zone: 'utc' }).plus({ months: maxMonths });
  if (range.end.getTime() > limit.toMillis()) {
    throw new TimeRangeTooLargeError(maxMonths);
  }
}

function groupByCalendar(calendars: Calendar[], events: CalendarEvent[]): CalendarWithEvents[] {
  const byCalendar = new Map<number, CalendarEvent[]>();
  for (const event of events) {
    const bucket = byCalendar.get(event.calendarId);
    if (bucket) {
      bucket.push(event);
    } else {
      byCalendar.set(event.calendarId, [event]);
    }
  }
  return calendars.map((calendar) => ({ calendar, events: byCalendar.get(calendar.id) ?? [] }));
}

export async function listCalendars(userId: number, options: { force?: boolean } = {}): Promise<Calendar[]> {
  const engine = getCalendarSyncEngine();
  const synced = await engine.orchestrator.syncIfNeeded(userId, { force: options.force ?? false });
  engine.logger.debug('Listing calendars', { userId, synced });
  return engine.calendars.listCalendarsByUser(userId);
}

/**
 * Calendars of `userId` with the events overlapping the window, syncing
 * stale remote calendars first. Sync failures fall back to stored data.
 */
export async function getEventsWithSync(
  userId: number,
  range: TimeRange,
  options: { force?: boolean; viewerId?: number | null; signal?: AbortSignal } = {}
): Promise<CalendarEventsView> {
  const engine = getCalendarSyncEngine();
  validateTimeRange(range, engine.config.maxRangeMonths);

  const initial = await engine.calendars.listCalendarsByUser(userId);
  if (initial.length === 0) {
    return { calendars: [], synced: false };
  }

  const synced = await engine.orchestrator.syncIfNeeded(userId, {
    force: options.force ?? false,
    signal: options.signal
  });
  const calendars = synced ? await engine.calendars.listCalendarsByUser(userId) : initial;

  const events = await engine.calendars.listEventsInRange(
    calendars.map((calendar) => calendar.id),
    range.start,
    range.end
  );

  engine.logger.info('Retrieved calendar events', {
    userId,
    calendars: calendars.length,
    events: events.length,
    start: range.start.toISOString(),
    end: range.end.toISOString(),
    synced
  });

  const viewerId = options.viewerId === undefined ? userId : options.viewerId;
  return { calendars: applyRedaction(groupByCalendar(calendars, events), viewerId), synced };
}

/** What anyone may see of a user's schedule: public calendars, non-private events, redacted titles. */
export async function getPublicEvents(userId: number, range: TimeRange): Promise<CalendarWithEvents[]> {
  const view = await getEventsWithSync(userId, range, { viewerId: null });
  return toPublicView(view.calendars);
}

export async function importIcsCalendar(
  userId: number,
  input: { icsData: string; calendarName?: string | null }
): Promise<StaticImportResult> {
  const engine = getCalendarSyncEngine();
  let parsed: ParsedCalendarDocument;
  try {
    parsed = parseIcsDocument(input.icsData);
  } catch (error) {
    if (error instanceof IcsParseError) {
      throw new ValidationError({ code: 'invalid_ics_data', message: error.message });
    }
    throw error;
  }
  return engine.importer.import({ userId, document: parsed, calendarName: input.calendarName });
}

async function requireOwnedCalendar(userId: number, calendarId: number): Promise<Calendar> {
  const calendar = await getCalendarSyncEngine().calendars.findCalendarById(calendarId);
  if (!calendar || calendar.userId !== userId) {
    throw new NotFoundError('Calendar not found');
  }
  return calendar;
}

export async function updateCalendar(
  userId: number,
  calendarId: number,
  patch: CalendarSettingsUpdate
): Promise<Calendar> {
  await requireOwnedCalendar(userId, calendarId);
  const updated = await getCalendarSyncEngine().calendars.updateCalendarSettings(calendarId, patch);
  if (!updated) {
    throw new NotFoundError('Calendar not found');
  }
  return updated;
}

export async function deleteCalendar(userId: number, calendarId: number): Promise<void> {
  await requireOwnedCalendar(userId, calendarId);
  const engine = getCalendarSyncEngine();
  const deleted = await engine.calendars.softDeleteCalendar(calendarId);
  if (!deleted) {
    throw new NotFoundError('Calendar not found');
  }
  engine.logger.info('Deleted calendar', { userId, calendarId });
}
