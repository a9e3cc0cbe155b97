import type { NewCalendarEvent, StaticImportResult } from '@calsync/shared';
import { UNTITLED_CALENDAR_NAME, type ParsedCalendarDocument } from '../ics.js';
import { convertIcsItem } from './eventTransforms.js';
import { describeError, type Logger } from './logger.js';
import type { CalendarStore, Clock } from './types.js';

export interface StaticImportRequest {
  userId: number;
  document: ParsedCalendarDocument;
  /** Caller-supplied name; wins over anything found in the document. */
  calendarName?: string | null;
}

export interface StaticCalendarImporterDeps {
  store: CalendarStore;
  logger: Logger;
  clock: Clock;
  untitledTitle: string | null;
}

export class StaticCalendarImporter {
  private readonly store: CalendarStore;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly untitledTitle: string | null;

  constructor(deps: StaticCalendarImporterDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
    this.clock = deps.clock;
    this.untitledTitle = deps.untitledTitle;
  }

  async import(request: StaticImportRequest): Promise<StaticImportResult> {
    const { userId, document } = request;
    const now = this.clock();
    const summary = request.calendarName?.trim() || document.name || UNTITLED_CALENDAR_NAME;

    const calendar = await this.store.createCalendar({
      userId,
      sourceId: null,
      provider: 'ics',
      summary,
      timeZone: document.timeZone ?? 'UTC',
      description: document.description,
      color: null,
      visibility: 'public',
      redaction: null,
      sync: {
        status: 'full_sync_complete',
        cursor: null,
        lastFullSyncAt: now,
        lastCheckedAt: now
      }
    });

    const bySource = new Map<string, NewCalendarEvent>();
    let skipped = 0;
    for (const item of document.items) {
      if (item.status?.toLowerCase() === 'cancelled') {
        skipped += 1;
        continue;
      }
      const converted = convertIcsItem(item, this.untitledTitle);
      if (!converted.ok) {
        skipped += 1;
        this.logger.warn('Skipping ICS event', { calendarId: calendar.id, uid: item.uid, reason: converted.reason });
        continue;
      }
      bySource.set(converted.event.sourceId, { ...converted.event, calendarId: calendar.id });
    }

    const events = [...bySource.values()];
    let eventsCount = 0;
    if (events.length > 0) {
      try {
        eventsCount = await this.store.createEvents(events);
      } catch (error) {
        this.logger.error('Failed to store imported ICS events', {
          calendarId: calendar.id,
          count: events.length,
          error: describeError(error)
        });
      }
    }

    this.logger.info('Imported ICS calendar', {
      userId,
      calendarId: calendar.id,
      summary,
      eventsCount,
      skipped
    });

    return { calendar, eventsCount };
  }
}
