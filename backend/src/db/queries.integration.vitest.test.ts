import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DataType, newDb } from 'pg-mem';
import { __setPoolForTests } from './client.js';
import {
  completeSyncPass,
  createCalendar,
  createEvents,
  createUser,
  deleteEventBySource,
  findCalendarById,
  findCalendarBySource,
  getAccount,
  listCalendarsByUser,
  listEventsByCalendar,
  listEventsInRange,
  softDeleteCalendar,
  upsertAccount
} from './queries.js';

const TEST_SCHEMA = `
  CREATE TABLE users (
    id SERIAL PRIMARY KEY,
    email TEXT NOT NULL UNIQUE,
    username TEXT NOT NULL UNIQUE,
    display_name TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
  CREATE TABLE accounts (
    id SERIAL PRIMARY KEY,
    user_id INTEGER NOT NULL REFERENCES users(id),
    provider TEXT NOT NULL,
    access_token TEXT,
    refresh_token TEXT,
    expires_at TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    UNIQUE (user_id, provider)
  );
  CREATE TABLE calendars (
    id SERIAL PRIMARY KEY,
    user_id INTEGER NOT NULL REFERENCES users(id),
    source_id TEXT,
    provider TEXT NOT NULL,
    summary TEXT NOT NULL,
    time_zone TEXT NOT NULL DEFAULT 'UTC',
    description TEXT,
    color TEXT,
    visibility TEXT NOT NULL DEFAULT 'private',
    redaction TEXT,
    sync_status TEXT NOT NULL DEFAULT 'never_synced',
    sync_cursor TEXT,
    last_full_sync_at TIMESTAMPTZ,
    last_checked_at TIMESTAMPTZ,
    deleted_at TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
  CREATE TABLE calendar_events (
    id SERIAL PRIMARY KEY,
    calendar_id INTEGER NOT NULL REFERENCES calendars(id),
    source_id TEXT NOT NULL,
    title TEXT NOT NULL,
    start_at TIMESTAMPTZ NOT NULL,
    end_at TIMESTAMPTZ NOT NULL,
    all_day BOOLEAN NOT NULL DEFAULT false,
    location TEXT,
    description TEXT,
    color TEXT,
    visibility TEXT NOT NULL DEFAULT 'inherited',
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    UNIQUE (calendar_id, source_id)
  );
`;

function event(calendarId: number, sourceId: string, title: string, day: number) {
  const date = `2025-10-${String(day).padStart(2, '0')}`;
  return {
    calendarId,
    sourceId,
    title,
    startAt: new Date(`${date}T09:00:00.000Z`),
    endAt: new Date(`${date}T10:00:00.000Z`),
    allDay: false,
    location: null,
    description: null,
    color: null,
    visibility: 'inherited' as const
  };
}

beforeEach(() => {
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  mem.public.registerFunction({
    name: 'now',
    returns: DataType.timestamptz,
    implementation: () => new Date()
  });
  mem.public.none(TEST_SCHEMA);
  const { Pool } = mem.adapters.createPg();
  __setPoolForTests(new Pool());
});

afterEach(() => {
  __setPoolForTests(null);
});

describe('postgres queries', () => {
  it('upserts one account per user and provider', async () => {
    const user = await createUser('owner@example.com', 'owner', 'Owner');

    await upsertAccount(user.id, 'google', { accessToken: 'access-1', refreshToken: 'refresh-1', expiresAt: null });
    await upsertAccount(user.id, 'google', {
      accessToken: 'access-2',
      refreshToken: 'refresh-2',
      expiresAt: new Date('2025-10-17T13:00:00.000Z')
    });

    const account = await getAccount(user.id, 'google');
    expect(account).toMatchObject({
      userId: user.id,
      accessToken: 'access-2',
      refreshToken: 'refresh-2',
      expiresAt: new Date('2025-10-17T13:00:00.000Z')
    });
  });

  it('stores calendars, their events and sync state', async () => {
    const user = await createUser('owner@example.com', 'owner', 'Owner');
    const calendar = await createCalendar({
      userId: user.id,
      sourceId: 'primary',
      provider: 'google',
      summary: 'Work',
      timeZone: 'Europe/Berlin',
      description: null,
      color: null,
      visibility: 'private',
      redaction: null,
      sync: { status: 'never_synced', cursor: null, lastFullSyncAt: null, lastCheckedAt: null }
    });

    await createEvents([event(calendar.id, 'a', 'Standup', 20), event(calendar.id, 'b', 'Retro', 27)]);
    await createEvents([event(calendar.id, 'a', 'Standup (moved)', 21)]);
    await completeSyncPass(calendar.id, {
      status: 'full_sync_complete',
      cursor: 'sync-1',
      lastFullSyncAt: new Date('2025-10-17T12:00:00.000Z'),
      lastCheckedAt: new Date('2025-10-17T12:00:00.000Z')
    });

    const stored = await listEventsByCalendar(calendar.id);
    expect(stored.map((row) => row.title)).toEqual(['Standup (moved)', 'Retro']);

    const inWindow = await listEventsInRange(
      [calendar.id],
      new Date('2025-10-21T00:00:00.000Z'),
      new Date('2025-10-22T00:00:00.000Z')
    );
    expect(inWindow.map((row) => row.sourceId)).toEqual(['a']);

    const reloaded = await findCalendarById(calendar.id);
    expect(reloaded?.sync).toEqual({
      status: 'full_sync_complete',
      cursor: 'sync-1',
      lastFullSyncAt: new Date('2025-10-17T12:00:00.000Z'),
      lastCheckedAt: new Date('2025-10-17T12:00:00.000Z')
    });

    await expect(deleteEventBySource(calendar.id, 'b')).resolves.toBe(true);
    expect((await listEventsByCalendar(calendar.id)).map((row) => row.sourceId)).toEqual(['a']);
  });

  it('soft deletes calendars and drops their events', async () => {
    const user = await createUser('owner@example.com', 'owner', 'Owner');
    const calendar = await createCalendar({
      userId: user.id,
      sourceId: 'team',
      provider: 'google',
      summary: 'Team',
      timeZone: 'UTC',
      description: null,
      color: null,
      visibility: 'public',
      redaction: null,
      sync: { status: 'incremental_sync', cursor: 'sync-1', lastFullSyncAt: null, lastCheckedAt: null }
    });
    await createEvents([event(calendar.id, 'a', 'Planning', 20)]);

    await expect(softDeleteCalendar(calendar.id)).resolves.toBe(true);

    await expect(listCalendarsByUser(user.id)).resolves.toEqual([]);
    await expect(findCalendarBySource(user.id, 'team')).resolves.toBeNull();
    const deleted = await findCalendarBySource(user.id, 'team', { includeDeleted: true });
    expect(deleted?.deleted).toBe(true);
    expect(deleted?.sync.cursor).toBeNull();
    await expect(listEventsByCalendar(calendar.id)).resolves.toEqual([]);
  });
});
