import ICAL from 'ical.js';

/**
 * Parse uploaded iCalendar (ICS) documents into plain data the static
 * importer can convert without touching ical.js types.
 */

type IcalComponent = InstanceType<typeof ICAL.Component>;
type IcalProperty = InstanceType<typeof ICAL.Property>;

export const UNTITLED_CALENDAR_NAME = 'Untitled Calendar';

/** Wall-clock reading of a DTSTART/DTEND value before any zone is applied. */
export interface IcsTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** VALUE=DATE, i.e. an all-day marker. */
  dateOnly: boolean;
  utc: boolean;
  tzid: string | null;
}

export interface ParsedCalendarItem {
  uid: string | null;
  recurrenceId: string | null;
  status: string | null;
  summary: string | null;
  description: string | null;
  location: string | null;
  start: IcsTime | null;
  end: IcsTime | null;
  durationSeconds: number | null;
}

export interface ParsedCalendarDocument {
  name: string | null;
  timeZone: string | null;
  description: string | null;
  items: ParsedCalendarItem[];
}

export class IcsParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IcsParseError';
  }
}

function textValue(component: IcalComponent, name: string): string | null {
  const value = component.getFirstPropertyValue(name);
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function tzidOf(property: IcalProperty): string | null {
  const param = property.getParameter('tzid');
  if (typeof param === 'string' && param.trim()) {
    return param.trim();
  }
  if (Array.isArray(param) && typeof param[0] === 'string') {
    return param[0];
  }
  return null;
}

function readTime(component: IcalComponent, name: string): IcsTime | null {
  const property = component.getFirstProperty(name);
  if (!property) {
    return null;
  }
  const value = property.getFirstValue();
  if (!(value instanceof ICAL.Time)) {
    return null;
  }
  return {
    year: value.year,
    month: value.month,
    day: value.day,
    hour: value.hour,
    minute: value.minute,
    second: value.second,
    dateOnly: value.isDate,
    utc: value.zone?.tzid === 'UTC',
    tzid: tzidOf(property)
  };
}

function readDuration(component: IcalComponent): number | null {
  const value = component.getFirstPropertyValue('duration');
  return value instanceof ICAL.Duration ? value.toSeconds() : null;
}

function readRecurrenceId(component: IcalComponent): string | null {
  const value = component.getFirstPropertyValue('recurrence-id');
  return value instanceof ICAL.Time ? value.toString() : null;
}

/**
 * Calendar display name, in order: X-WR-CALNAME, NAME, SUMMARY, then a PRODID
 * that does not look like `-//vendor//product`.
 */
export function extractCalendarName(calendar: IcalComponent): string | null {
  for (const property of ['x-wr-calname', 'name', 'summary']) {
    const value = textValue(calendar, property);
    if (value) {
      return value;
    }
  }
  const prodId = textValue(calendar, 'prodid');
  if (prodId && !prodId.includes('//')) {
    return prodId;
  }
  return null;
}

function toItem(vevent: IcalComponent): ParsedCalendarItem {
  return {
    uid: textValue(vevent, 'uid'),
    recurrenceId: readRecurrenceId(vevent),
    status: textValue(vevent, 'status'),
    summary: textValue(vevent, 'summary'),
    description: textValue(vevent, 'description'),
    location: textValue(vevent, 'location'),
    start: readTime(vevent, 'dtstart'),
    end: readTime(vevent, 'dtend'),
    durationSeconds: readDuration(vevent)
  };
}

export function parseIcsDocument(text: string): ParsedCalendarDocument {
  if (!text.trim()) {
    throw new IcsParseError('ICS data is required');
  }

  let root: IcalComponent;
  try {
    root = ICAL.Component.fromString(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new IcsParseError(`Failed to parse ICS data: ${reason}`);
  }

  const calendar = root.name === 'vcalendar' ? root : root.getFirstSubcomponent('vcalendar');
  if (!calendar) {
    throw new IcsParseError('Failed to parse ICS data: no VCALENDAR component');
  }

  const items = calendar.getAllSubcomponents('vevent').map(toItem);
  if (items.length === 0) {
    throw new IcsParseError('no events found in ICS file');
  }

  return {
    name: extractCalendarName(calendar),
    timeZone: textValue(calendar, 'x-wr-timezone'),
    description: textValue(calendar, 'x-wr-caldesc'),
    items
  };
}
