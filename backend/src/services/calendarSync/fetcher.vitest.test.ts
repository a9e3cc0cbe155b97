import { describe, expect, it } from 'vitest';
import { ProviderRequestError, SyncCursorInvalidError } from './errors.js';
import { RemoteEventFetcher, toRemoteCalendarSummary } from './fetcher.js';
import { createTestClock, ScriptedTransport, silentLogger } from './calendarSync.testDoubles.js';

function setup() {
  const transport = new ScriptedTransport();
  const fetcher = new RemoteEventFetcher({
    transport,
    logger: silentLogger,
    clock: createTestClock('2025-10-17T12:00:00.000Z').now,
    baseUrl: 'https://calendar.test/v3',
    pageSize: 250,
    lookbackDays: 30,
    lookaheadDays: 365
  });
  return { transport, fetcher };
}

const timed = {
  start: { dateTime: '2025-10-20T09:00:00Z' },
  end: { dateTime: '2025-10-20T10:00:00Z' }
};

describe('RemoteEventFetcher', () => {
  it('bounds full passes by the lookback and lookahead window', () => {
    const { fetcher } = setup();

    const params = fetcher.buildEventsParams({ kind: 'full' });

    expect(Object.fromEntries(params)).toEqual({
      showDeleted: 'true',
      maxResults: '250',
      singleEvents: 'true',
      orderBy: 'startTime',
      timeMin: '2025-09-17T12:00:00.000Z',
      timeMax: '2026-10-17T12:00:00.000Z'
    });
  });

  it('sends only the cursor for incremental passes', () => {
    const { fetcher } = setup();

    const params = fetcher.buildEventsParams({ kind: 'incremental', cursor: 'cursor-1' }, 'page-2');

    expect(Object.fromEntries(params)).toEqual({
      showDeleted: 'true',
      maxResults: '250',
      syncToken: 'cursor-1',
      pageToken: 'page-2'
    });
  });

  it('follows page tokens and keeps the cursor from the last page', async () => {
    const { transport, fetcher } = setup();
    transport.onGet('/calendars/primary/events', (request) =>
      request.url.searchParams.get('pageToken') === 'p2'
        ? { items: [{ id: 'b', ...timed }], nextSyncToken: 'sync-final' }
        : { items: [{ id: 'a', ...timed }, { summary: 'missing id' }], nextPageToken: 'p2' }
    );

    const result = await fetcher.fetchEvents('token-1', 'primary', { kind: 'full' });

    expect(result.items.map((item) => item.id)).toEqual(['a', 'b']);
    expect(result.malformed).toBe(1);
    expect(result.nextCursor).toBe('sync-final');
    expect(transport.requests).toHaveLength(2);
    expect(transport.requests.every((request) => request.accessToken === 'token-1')).toBe(true);
  });

  it('turns a 410 on an incremental pass into a cursor invalidation', async () => {
    const { transport, fetcher } = setup();
    transport.onGet('/calendars/primary/events', () => {
      throw new ProviderRequestError('Provider request failed: Gone', 410);
    });

    await expect(
      fetcher.fetchEvents('token-1', 'primary', { kind: 'incremental', cursor: 'stale' })
    ).rejects.toBeInstanceOf(SyncCursorInvalidError);
    await expect(fetcher.fetchEvents('token-1', 'primary', { kind: 'full' })).rejects.toBeInstanceOf(
      ProviderRequestError
    );
  });

  it('lists calendars across pages and skips deleted entries', async () => {
    const { transport, fetcher } = setup();
    transport.onGet('/users/me/calendarList', (request) =>
      request.url.searchParams.get('pageToken')
        ? { items: [{ id: 'team', summary: 'Team', deleted: true }] }
        : { items: [{ id: 'primary', summary: 'Me', primary: true }], nextPageToken: 'next' }
    );

    const entries = await fetcher.listCalendars('token-1');

    expect(entries.map((entry) => entry.id)).toEqual(['primary']);
  });
});

describe('toRemoteCalendarSummary', () => {
  it('prefers the user override and fills defaults', () => {
    expect(toRemoteCalendarSummary({ id: 'cal-1', summary: 'Shared', summaryOverride: 'Mine' }, true)).toEqual({
      id: 'cal-1',
      summary: 'Mine',
      description: null,
      timeZone: 'UTC',
      backgroundColor: null,
      primary: false,
      accessRole: null,
      imported: true
    });
  });
});
