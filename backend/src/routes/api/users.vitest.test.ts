import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import request from 'supertest';

const findUserById = vi.hoisted(() => vi.fn());

vi.mock('../../db/queries.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../db/queries.js')>()),
  findUserById
}));

const { createApp } = await import('../../app.js');
const { __setCalendarSyncEngineForTests } = await import('../../services/calendarSync.js');
const { buildNewCalendar, createTestEngine } = await import('../../services/calendarSync/calendarSync.testDoubles.js');

const OCT_1 = 1759276800;
const OCT_31 = 1761868800;

let harness: ReturnType<typeof createTestEngine>;

beforeEach(() => {
  harness = createTestEngine();
  __setCalendarSyncEngineForTests(harness.engine);
  findUserById.mockResolvedValue({
    id: 1,
    email: 'owner@example.com',
    username: 'owner',
    displayName: 'Owner',
    createdAt: new Date('2025-09-01T00:00:00.000Z')
  });
});

afterEach(() => {
  __setCalendarSyncEngineForTests(null);
});

describe('public user routes', () => {
  it('shows public calendars with redacted titles and no private events', async () => {
    const shared = harness.calendars.seedCalendar(
      buildNewCalendar({ provider: 'ics', sourceId: null, visibility: 'public', redaction: 'Busy' })
    );
    harness.calendars.seedCalendar(buildNewCalendar({ summary: 'Private', sourceId: 'private' }));
    for (const [sourceId, title, visibility] of [
      ['gym', 'Gym', 'inherited'],
      ['doctor', 'Doctor', 'private']
    ] as const) {
      harness.calendars.seedEvent({
        calendarId: shared.id,
        sourceId,
        title,
        startAt: new Date('2025-10-20T07:00:00.000Z'),
        endAt: new Date('2025-10-20T08:00:00.000Z'),
        allDay: false,
        location: null,
        description: null,
        color: null,
        visibility
      });
    }

    const response = await request(createApp())
      .get('/api/users/1/events')
      .query({ start_timestamp: String(OCT_1), end_timestamp: String(OCT_31) });

    expect(response.status).toBe(200);
    expect(response.body.user).toEqual({ id: 1, username: 'owner', displayName: 'Owner' });
    expect(response.body.calendars).toHaveLength(1);
    expect(response.body.calendars[0].events.map((event: { title: string }) => event.title)).toEqual(['[Busy] Gym']);
  });

  it('returns 404 for unknown users', async () => {
    findUserById.mockResolvedValueOnce(undefined);

    const response = await request(createApp())
      .get('/api/users/99/events')
      .query({ start_timestamp: String(OCT_1), end_timestamp: String(OCT_31) });

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'User not found' });
  });
});
