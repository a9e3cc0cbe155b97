import { randomUUID } from 'crypto';
import { DateTime } from 'luxon';
import type { CalendarEventVisibility, NewCalendarEvent } from '@calsync/shared';
import type { IcsTime, ParsedCalendarItem } from '../ics.js';
import type { RemoteEvent, RemoteEventDate } from './remoteSchemas.js';

export type EventContent = Omit<NewCalendarEvent, 'calendarId'>;

export type ConversionFailure = 'missing_title' | 'missing_time' | 'invalid_time';

export type ConversionResult =
  | { ok: true; event: EventContent }
  | { ok: false; reason: ConversionFailure };

const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const RFC3339_OFFSET_PATTERN = /(Z|[+-]\d{2}:\d{2})$/i;

export interface ParsedInstant {
  at: Date;
  allDay: boolean;
}

/**
 * Date-only values are all-day markers anchored at UTC midnight; dateTime
 * values must be RFC 3339 timestamps carrying an offset.
 */
export function parseRemoteDate(value: RemoteEventDate | undefined): ParsedInstant | null {
  if (!value) {
    return null;
  }

  if (value.dateTime) {
    if (!RFC3339_OFFSET_PATTERN.test(value.dateTime)) {
      return null;
    }
    const parsed = DateTime.fromISO(value.dateTime, { setZone: true });
    return parsed.isValid ? { at: parsed.toJSDate(), allDay: false } : null;
  }

  if (value.date) {
    if (!DATE_ONLY_PATTERN.test(value.date)) {
      return null;
    }
    const parsed = DateTime.fromISO(value.date, { zone: 'utc' });
    return parsed.isValid ? { at: parsed.toJSDate(), allDay: true } : null;
  }

  return null;
}

export function mapRemoteVisibility(visibility: string | undefined): CalendarEventVisibility {
  switch (visibility) {
    case 'public':
      return 'public';
    case 'private':
    case 'confidential':
      return 'private';
    default:
      return 'inherited';
  }
}

export function isCancelled(event: { status?: string | null }): boolean {
  return event.status?.toLowerCase() === 'cancelled';
}

export function convertRemoteEvent(event: RemoteEvent, untitledTitle: string | null): ConversionResult {
  const title = event.summary?.trim() || untitledTitle;
  if (!title) {
    return { ok: false, reason: 'missing_title' };
  }
  if (!event.start || !event.end) {
    return { ok: false, reason: 'missing_time' };
  }

  const start = parseRemoteDate(event.start);
  const end = parseRemoteDate(event.end);
  if (!start || !end) {
    return { ok: false, reason: 'invalid_time' };
  }

  return {
    ok: true,
    event: {
      sourceId: event.id,
      title,
      startAt: start.at,
      endAt: end.at,
      allDay: start.allDay,
      location: event.location ?? null,
      description: event.description ?? null,
      color: event.colorId ?? null,
      visibility: mapRemoteVisibility(event.visibility)
    }
  };
}

/**
 * Resolve an ICS wall-clock reading to an instant. Date-only values become
 * UTC midnight. Floating times and unknown TZIDs are read as UTC.
 */
export function resolveIcsTime(time: IcsTime): DateTime {
  const fields = {
    year: time.year,
    month: time.month,
    day: time.day,
    hour: time.dateOnly ? 0 : time.hour,
    minute: time.dateOnly ? 0 : time.minute,
    second: time.dateOnly ? 0 : time.second
  };

  if (time.dateOnly || time.utc || !time.tzid) {
    return DateTime.fromObject(fields, { zone: 'utc' });
  }

  const zoned = DateTime.fromObject(fields, { zone: time.tzid });
  return zoned.isValid ? zoned : DateTime.fromObject(fields, { zone: 'utc' });
}

export function icsSourceId(item: ParsedCalendarItem): string {
  const uid = item.uid ?? randomUUID();
  return item.recurrenceId ? `${uid}_${item.recurrenceId}` : uid;
}

export function convertIcsItem(item: ParsedCalendarItem, untitledTitle: string | null): ConversionResult {
  const title = item.summary ?? untitledTitle;
  if (!title) {
    return { ok: false, reason: 'missing_title' };
  }
  if (!item.start) {
    return { ok: false, reason: 'missing_time' };
  }

  const start = resolveIcsTime(item.start);
  if (!start.isValid) {
    return { ok: false, reason: 'invalid_time' };
  }

  let end: DateTime;
  if (item.end) {
    end = resolveIcsTime(item.end);
  } else if (item.durationSeconds !== null) {
    end = start.plus({ seconds: item.durationSeconds });
  } else {
    // RFC 5545: a date-only DTSTART without DTEND spans one day
    end = item.start.dateOnly ? start.plus({ days: 1 }) : start;
  }
  if (!end.isValid) {
    return { ok: false, reason: 'invalid_time' };
  }

  return {
    ok: true,
    event: {
      sourceId: icsSourceId(item),
      title,
      startAt: start.toJSDate(),
      endAt: end.toJSDate(),
      allDay: item.start.dateOnly,
      location: item.location,
      description: item.description,
      color: null,
      visibility: 'inherited'
    }
  };
}
