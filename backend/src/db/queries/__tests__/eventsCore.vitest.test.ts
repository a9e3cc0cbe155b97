import { beforeEach, describe, expect, it, vi } from 'vitest';

const clientMocks = vi.hoisted(() => ({
  query: vi.fn()
}));

const dbMocks = vi.hoisted(() => ({
  query: vi.fn(),
  withTransaction: vi.fn(async (work: (client: typeof clientMocks) => Promise<unknown>) => work(clientMocks))
}));

vi.mock('../shared.js', () => ({
  db: dbMocks
}));

const { createEvents, deleteEventBySource, listEventsInRange, updateEvents } = await import('../events.js');

function newEvent(sourceId: string) {
  return {
    calendarId: 5,
    sourceId,
    title: `Event ${sourceId}`,
    startAt: new Date('2025-10-20T09:00:00.000Z'),
    endAt: new Date('2025-10-20T10:00:00.000Z'),
    allDay: false,
    location: null,
    description: null,
    color: null,
    visibility: 'inherited' as const
  };
}

beforeEach(() => {
  vi.clearAllMocks();
  dbMocks.query.mockResolvedValue({ rows: [], rowCount: 0 });
  clientMocks.query.mockResolvedValue({ rows: [], rowCount: 1 });
});

describe('event queries', () => {
  it('skips the query for an empty calendar list', async () => {
    await expect(listEventsInRange([], new Date(), new Date())).resolves.toEqual([]);
    expect(dbMocks.query).not.toHaveBeenCalled();
  });

  it('filters by overlap with the window', async () => {
    const start = new Date('2025-10-01T00:00:00.000Z');
    const end = new Date('2025-10-31T00:00:00.000Z');

    await listEventsInRange([5, 8], start, end);

    const [sql, params] = dbMocks.query.mock.calls[0] ?? [];
    expect(sql).toContain('calendar_id IN ($3, $4)');
    expect(sql).toContain('start_at <= $2');
    expect(sql).toContain('end_at >= $1');
    expect(params).toEqual([start, end, 5, 8]);
  });

  it('inserts in chunks of 500 rows', async () => {
    dbMocks.query.mockResolvedValueOnce({ rows: [], rowCount: 500 }).mockResolvedValueOnce({ rows: [], rowCount: 1 });
    const events = Array.from({ length: 501 }, (_, index) => newEvent(`e${index}`));

    await expect(createEvents(events)).resolves.toBe(501);

    expect(dbMocks.query).toHaveBeenCalledTimes(2);
    expect(dbMocks.query.mock.calls[0]?.[1]).toHaveLength(5000);
    const [lastSql, lastParams] = dbMocks.query.mock.calls[1] ?? [];
    expect(lastSql).toContain('VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)');
    expect(lastSql).toContain('ON CONFLICT (calendar_id, source_id) DO UPDATE');
    expect(lastParams).toEqual([
      5,
      'e500',
      'Event e500',
      new Date('2025-10-20T09:00:00.000Z'),
      new Date('2025-10-20T10:00:00.000Z'),
      false,
      null,
      null,
      null,
      'inherited'
    ]);
  });

  it('updates rows by id inside a transaction', async () => {
    const stored = {
      ...newEvent('a'),
      id: 11,
      createdAt: new Date('2025-10-01T00:00:00.000Z'),
      updatedAt: new Date('2025-10-01T00:00:00.000Z')
    };

    await expect(updateEvents([stored, { ...stored, id: 12 }])).resolves.toBe(2);
    expect(dbMocks.withTransaction).toHaveBeenCalledTimes(1);
    expect(clientMocks.query.mock.calls.map((call) => call[1]?.[0])).toEqual([11, 12]);
  });

  it('reports whether a delete matched a row', async () => {
    dbMocks.query.mockResolvedValueOnce({ rows: [], rowCount: 1 });

    await expect(deleteEventBySource(5, 'a')).resolves.toBe(true);
    await expect(deleteEventBySource(5, 'missing')).resolves.toBe(false);
  });
});
