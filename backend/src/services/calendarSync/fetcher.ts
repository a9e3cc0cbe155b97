import type { RemoteCalendarSummary } from '@calsync/shared';
import { CalendarSyncException, SyncCursorInvalidError } from './errors.js';
import type { ProviderTransport } from './http.js';
import type { Logger } from './logger.js';
import {
  remoteCalendarEntrySchema,
  remoteCalendarListPageSchema,
  remoteEventSchema,
  remoteEventsPageSchema,
  type RemoteCalendarEntry,
  type RemoteEvent
} from './remoteSchemas.js';
import type { Clock, SyncMode } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FetchResult {
  items: RemoteEvent[];
  /** Items dropped because they did not match the event shape. */
  malformed: number;
  nextCursor: string | null;
}

export interface RemoteEventFetcherDeps {
  transport: ProviderTransport;
  logger: Logger;
  clock: Clock;
  baseUrl: string;
  pageSize: number;
  lookbackDays: number;
  lookaheadDays: number;
}

export class RemoteEventFetcher {
  private readonly transport: ProviderTransport;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly lookbackDays: number;
  private readonly lookaheadDays: number;

  constructor(deps: RemoteEventFetcherDeps) {
    this.transport = deps.transport;
    this.logger = deps.logger;
    this.clock = deps.clock;
    this.baseUrl = deps.baseUrl;
    this.pageSize = deps.pageSize;
    this.lookbackDays = deps.lookbackDays;
    this.lookaheadDays = deps.lookaheadDays;
  }

  buildEventsParams(mode: SyncMode, pageToken?: string): URLSearchParams {
    const params = new URLSearchParams({
      showDeleted: 'true',
      maxResults: String(this.pageSize)
    });

    if (mode.kind === 'incremental') {
      params.set('syncToken', mode.cursor);
    } else {
      const now = this.clock().getTime();
      params.set('singleEvents', 'true');
      params.set('orderBy', 'startTime');
      params.set('timeMin', new Date(now - this.lookbackDays * DAY_MS).toISOString());
      params.set('timeMax', new Date(now + this.lookaheadDays * DAY_MS).toISOString());
    }

    if (pageToken) {
      params.set('pageToken', pageToken);
    }
    return params;
  }

  async fetchEvents(
    accessToken: string,
    calendarSourceId: string,
    mode: SyncMode,
    signal?: AbortSignal
  ): Promise<FetchResult> {
    const url = `${this.baseUrl}/calendars/${encodeURIComponent(calendarSourceId)}/events`;
    const items: RemoteEvent[] = [];
    let malformed = 0;
    let pageToken: string | undefined;
    let nextCursor: string | null = null;
    let pages = 0;

    do {
      const params = this.buildEventsParams(mode, pageToken);
      let payload: unknown;
      try {
        payload = await this.transport.getJson(`${url}?${params.toString()}`, { accessToken, signal });
      } catch (error) {
        if (mode.kind === 'incremental' && error instanceof CalendarSyncException && error.status === 410) {
          throw new SyncCursorInvalidError({ calendarSourceId, page: pages });
        }
        throw error;
      }

      const page = remoteEventsPageSchema.parse(payload ?? {});
      for (const raw of page.items ?? []) {
        const parsed = remoteEventSchema.safeParse(raw);
        if (parsed.success) {
          items.push(parsed.data);
        } else {
          malformed += 1;
        }
      }

      pages += 1;
      pageToken = page.nextPageToken;
      if (!pageToken) {
        nextCursor = page.nextSyncToken ?? null;
      }
    } while (pageToken);

    if (malformed > 0) {
      this.logger.warn('Dropped malformed remote events', { calendarSourceId, malformed });
    }
    this.logger.debug('Fetched remote events', {
      calendarSourceId,
      mode: mode.kind,
      pages,
      items: items.length,
      hasCursor: nextCursor !== null
    });

    return { items, malformed, nextCursor };
  }

  async listCalendars(accessToken: string, signal?: AbortSignal): Promise<RemoteCalendarEntry[]> {
    const entries: RemoteCalendarEntry[] = [];
    let pageToken: string | undefined;

    do {
      const params = new URLSearchParams({ maxResults: '250' });
      if (pageToken) {
        params.set('pageToken', pageToken);
      }
      const payload = await this.transport.getJson(`${this.baseUrl}/users/me/calendarList?${params.toString()}`, {
        accessToken,
        signal
      });
      const page = remoteCalendarListPageSchema.parse(payload ?? {});
      for (const raw of page.items ?? []) {
        const parsed = remoteCalendarEntrySchema.safeParse(raw);
        if (parsed.success && !parsed.data.deleted) {
          entries.push(parsed.data);
        }
      }
      pageToken = page.nextPageToken;
    } while (pageToken);

    return entries;
  }

  async getCalendar(accessToken: string, calendarSourceId: string, signal?: AbortSignal): Promise<RemoteCalendarEntry> {
    const payload = await this.transport.getJson(
      `${this.baseUrl}/users/me/calendarList/${encodeURIComponent(calendarSourceId)}`,
      { accessToken, signal }
    );
    return remoteCalendarEntrySchema.parse(payload);
  }
}

export function toRemoteCalendarSummary(entry: RemoteCalendarEntry, imported: boolean): RemoteCalendarSummary {
  return {
    id: entry.id,
    summary: entry.summaryOverride ?? entry.summary ?? entry.id,
    description: entry.description ?? null,
    timeZone: entry.timeZone ?? 'UTC',
    backgroundColor: entry.backgroundColor ?? null,
    primary: entry.primary ?? false,
    accessRole: entry.accessRole ?? null,
    imported
  };
}
