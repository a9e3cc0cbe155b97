import type { CalendarEvent, CalendarWithEvents } from '@calsync/shared';

export function redactTitle(title: string, redaction: string | null): string {
  return redaction ? `[${redaction}] ${title}` : title;
}

/**
 * View-time redaction. Owners see titles untouched; everyone else sees the
 * calendar's redaction label in front of each title. Nothing is persisted.
 */
export function applyRedaction(groups: CalendarWithEvents[], viewerId: number | null): CalendarWithEvents[] {
  return groups.map((group) => {
    const { calendar } = group;
    if (viewerId === calendar.userId || !calendar.redaction) {
      return group;
    }
    const redaction = calendar.redaction;
    return {
      calendar,
      events: group.events.map((event): CalendarEvent => ({ ...event, title: redactTitle(event.title, redaction) }))
    };
  });
}

/** Public profile view: public calendars only, private events dropped. */
export function toPublicView(groups: CalendarWithEvents[]): CalendarWithEvents[] {
  return groups
    .filter((group) => group.calendar.visibility === 'public')
    .map((group) => ({
      calendar: group.calendar,
      events: group.events.filter((event) => event.visibility !== 'private')
    }));
}
