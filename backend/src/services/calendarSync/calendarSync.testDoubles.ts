import type {
  Account,
  AccountProvider,
  AccountTokens,
  Calendar,
  CalendarEvent,
  CalendarSettingsUpdate,
  NewCalendar,
  NewCalendarEvent
} from '@calsync/shared';
import type { ProviderRequestOptions, ProviderTransport } from './http.js';
import { createLogger, type Logger } from './logger.js';
import type { CalendarStore, Clock, CredentialStore, SyncPassUpdate } from './types.js';
import { createCalendarSyncEngine, type CalendarSyncEngine } from '../calendarSync.js';
import type { RefreshedToken, TokenClient } from './auth.js';

export const silentLogger: Logger = createLogger('Test', 'silent');

export interface TestClock {
  now: Clock;
  set(iso: string): void;
  advance(ms: number): void;
}

export function createTestClock(iso = '2025-10-17T12:00:00.000Z'): TestClock {
  let current = Date.parse(iso);
  return {
    now: () => new Date(current),
    set: (next) => {
      current = Date.parse(next);
    },
    advance: (ms) => {
      current += ms;
    }
  };
}

export function buildAccount(overrides: Partial<Account> = {}): Account {
  return {
    id: 1,
    userId: 1,
    provider: 'google',
    accessToken: 'access-1',
    refreshToken: 'refresh-1',
    expiresAt: new Date('2025-10-17T13:00:00.000Z'),
    createdAt: new Date('2025-10-01T00:00:00.000Z'),
    updatedAt: new Date('2025-10-01T00:00:00.000Z'),
    ...overrides
  };
}

export function buildNewCalendar(overrides: Partial<NewCalendar> = {}): NewCalendar {
  return {
    userId: 1,
    sourceId: 'primary',
    provider: 'google',
    summary: 'Work',
    timeZone: 'UTC',
    description: null,
    color: null,
    visibility: 'private',
    redaction: null,
    sync: { status: 'never_synced', cursor: null, lastFullSyncAt: null, lastCheckedAt: null },
    ...overrides
  };
}

export class InMemoryCredentialStore implements CredentialStore {
  readonly accounts = new Map<string, Account>();
  readonly tokenUpdates: AccountTokens[] = [];
  private nextId = 1;

  seed(account: Account): Account {
    this.accounts.set(this.key(account.userId, account.provider), account);
    this.nextId = Math.max(this.nextId, account.id + 1);
    return account;
  }

  async getAccount(userId: number, provider: AccountProvider): Promise<Account | null> {
    return this.accounts.get(this.key(userId, provider)) ?? null;
  }

  async updateAccountTokens(userId: number, provider: AccountProvider, tokens: AccountTokens): Promise<Account> {
    const existing = this.accounts.get(this.key(userId, provider));
    if (!existing) {
      throw new Error(`No ${provider} account for user ${userId}`);
    }
    this.tokenUpdates.push(tokens);
    const updated: Account = { ...existing, ...tokens, updatedAt: new Date(existing.updatedAt.getTime() + 1) };
    this.accounts.set(this.key(userId, provider), updated);
    return updated;
  }

  async upsertAccount(userId: number, provider: AccountProvider, tokens: AccountTokens): Promise<Account> {
    const existing = this.accounts.get(this.key(userId, provider));
    if (existing) {
      return this.updateAccountTokens(userId, provider, tokens);
    }
    const created: Account = {
      id: this.nextId++,
      userId,
      provider,
      ...tokens,
      createdAt: new Date(0),
      updatedAt: new Date(0)
    };
    this.accounts.set(this.key(userId, provider), created);
    return created;
  }

  private key(userId: number, provider: AccountProvider): string {
    return `${userId}:${provider}`;
  }
}

interface StoredCalendar {
  calendar: Calendar;
  deleted: boolean;
}

export class InMemoryCalendarStore implements CalendarStore {
  readonly calendars = new Map<number, StoredCalendar>();
  readonly events = new Map<number, CalendarEvent>();
  readonly passes: Array<{ calendarId: number; update: SyncPassUpdate }> = [];
  readonly clearedCursors: number[] = [];

  failCreate: Error | null = null;
  failUpdate: Error | null = null;
  readonly failDeleteFor = new Set<string>();

  private nextCalendarId = 1;
  private nextEventId = 1;

  constructor(private readonly clock: Clock = () => new Date('2025-10-17T12:00:00.000Z')) {}

  seedCalendar(input: NewCalendar): Calendar {
    const now = this.clock();
    const calendar: Calendar = { ...input, id: this.nextCalendarId++, createdAt: now, updatedAt: now };
    this.calendars.set(calendar.id, { calendar, deleted: false });
    return calendar;
  }

  seedEvent(input: NewCalendarEvent): CalendarEvent {
    const now = this.clock();
    const event: CalendarEvent = { ...input, id: this.nextEventId++, createdAt: now, updatedAt: now };
    this.events.set(event.id, event);
    return event;
  }

  calendar(calendarId: number): Calendar {
    const stored = this.calendars.get(calendarId);
    if (!stored) {
      throw new Error(`Unknown calendar ${calendarId}`);
    }
    return stored.calendar;
  }

  eventsOf(calendarId: number): CalendarEvent[] {
    return [...this.events.values()]
      .filter((event) => event.calendarId === calendarId)
      .sort((a, b) => a.sourceId.localeCompare(b.sourceId));
  }

  async listCalendarsByUser(userId: number): Promise<Calendar[]> {
    return [...this.calendars.values()]
      .filter((entry) => !entry.deleted && entry.calendar.userId === userId)
      .map((entry) => entry.calendar)
      .sort((a, b) => a.id - b.id);
  }

  async findCalendarById(calendarId: number): Promise<Calendar | null> {
    const stored = this.calendars.get(calendarId);
    return stored && !stored.deleted ? stored.calendar : null;
  }

  async findCalendarBySource(
    userId: number,
    sourceId: string,
    options: { includeDeleted?: boolean } = {}
  ): Promise<(Calendar & { deleted: boolean }) | null> {
    for (const entry of this.calendars.values()) {
      if (entry.calendar.userId !== userId || entry.calendar.sourceId !== sourceId) continue;
      if (entry.deleted && !options.includeDeleted) continue;
      return { ...entry.calendar, deleted: entry.deleted };
    }
    return null;
  }

  async createCalendar(input: NewCalendar): Promise<Calendar> {
    return this.seedCalendar(input);
  }

  async reviveCalendar(calendarId: number, input: NewCalendar): Promise<Calendar> {
    const stored = this.calendars.get(calendarId);
    if (!stored) {
      throw new Error(`Unknown calendar ${calendarId}`);
    }
    const calendar: Calendar = { ...stored.calendar, ...input, id: calendarId, updatedAt: this.clock() };
    this.calendars.set(calendarId, { calendar, deleted: false });
    return calendar;
  }

  async updateCalendarSettings(calendarId: number, patch: CalendarSettingsUpdate): Promise<Calendar | null> {
    const stored = this.calendars.get(calendarId);
    if (!stored || stored.deleted) return null;
    const calendar: Calendar = { ...stored.calendar, ...patch };
    this.calendars.set(calendarId, { calendar, deleted: false });
    return calendar;
  }

  async softDeleteCalendar(calendarId: number): Promise<boolean> {
    const stored = this.calendars.get(calendarId);
    if (!stored || stored.deleted) return false;
    this.calendars.set(calendarId, {
      calendar: { ...stored.calendar, sync: { ...stored.calendar.sync, cursor: null } },
      deleted: true
    });
    for (const event of this.eventsOf(calendarId)) {
      this.events.delete(event.id);
    }
    return true;
  }

  async clearSyncCursor(calendarId: number): Promise<void> {
    this.clearedCursors.push(calendarId);
    const calendar = this.calendar(calendarId);
    this.replaceCalendar({ ...calendar, sync: { ...calendar.sync, cursor: null } });
  }

  async completeSyncPass(calendarId: number, update: SyncPassUpdate): Promise<void> {
    this.passes.push({ calendarId, update });
    const calendar = this.calendar(calendarId);
    this.replaceCalendar({
      ...calendar,
      sync: {
        status: update.status,
        cursor: update.cursor,
        lastFullSyncAt: update.lastFullSyncAt ?? calendar.sync.lastFullSyncAt,
        lastCheckedAt: update.lastCheckedAt
      }
    });
  }

  async listEventsByCalendar(calendarId: number): Promise<CalendarEvent[]> {
    return this.eventsOf(calendarId);
  }

  async listEventsInRange(calendarIds: number[], start: Date, end: Date): Promise<CalendarEvent[]> {
    return [...this.events.values()]
      .filter(
        (event) =>
          calendarIds.includes(event.calendarId) &&
          event.startAt.getTime() <= end.getTime() &&
          event.endAt.getTime() >= start.getTime()
      )
      .sort((a, b) => a.startAt.getTime() - b.startAt.getTime());
  }

  async createEvents(events: NewCalendarEvent[]): Promise<number> {
    if (this.failCreate) throw this.failCreate;
    for (const input of events) {
      const existing = this.eventsOf(input.calendarId).find((event) => event.sourceId === input.sourceId);
      if (existing) {
        this.events.set(existing.id, { ...existing, ...input });
      } else {
        this.seedEvent(input);
      }
    }
    return events.length;
  }

  async updateEvents(events: CalendarEvent[]): Promise<number> {
    if (this.failUpdate) throw this.failUpdate;
    let updated = 0;
    for (const event of events) {
      if (this.events.has(event.id)) {
        this.events.set(event.id, event);
        updated += 1;
      }
    }
    return updated;
  }

  async deleteEventBySource(calendarId: number, sourceId: string): Promise<boolean> {
    if (this.failDeleteFor.has(sourceId)) {
      throw new Error(`delete failed for ${sourceId}`);
    }
    const match = this.eventsOf(calendarId).find((event) => event.sourceId === sourceId);
    if (!match) return false;
    this.events.delete(match.id);
    return true;
  }

  private replaceCalendar(calendar: Calendar): void {
    const stored = this.calendars.get(calendar.id);
    this.calendars.set(calendar.id, { calendar, deleted: stored?.deleted ?? false });
  }
}

export interface RecordedRequest {
  method: 'GET' | 'POST';
  url: URL;
  accessToken?: string;
  body?: URLSearchParams;
}

type Responder = (request: RecordedRequest) => unknown;

/**
 * Provider transport answering from handlers registered per URL path. A
 * responder may throw to simulate a failed request.
 */
export class ScriptedTransport implements ProviderTransport {
  readonly requests: RecordedRequest[] = [];
  private readonly handlers: Array<{ method: RecordedRequest['method']; path: string; respond: Responder }> = [];

  onGet(path: string, respond: Responder): this {
    this.handlers.push({ method: 'GET', path, respond });
    return this;
  }

  onPost(path: string, respond: Responder): this {
    this.handlers.push({ method: 'POST', path, respond });
    return this;
  }

  requestsTo(path: string): RecordedRequest[] {
    return this.requests.filter((request) => request.url.pathname.endsWith(path));
  }

  async getJson(url: string, options: ProviderRequestOptions = {}): Promise<unknown> {
    return this.dispatch({ method: 'GET', url: new URL(url), accessToken: options.accessToken });
  }

  async postForm(url: string, params: URLSearchParams, options: ProviderRequestOptions = {}): Promise<unknown> {
    return this.dispatch({ method: 'POST', url: new URL(url), accessToken: options.accessToken, body: params });
  }

  private dispatch(request: RecordedRequest): unknown {
    this.requests.push(request);
    const handler = this.handlers.find(
      (candidate) => candidate.method === request.method && request.url.pathname.endsWith(candidate.path)
    );
    if (!handler) {
      throw new Error(`No scripted response for ${request.method} ${request.url.pathname}`);
    }
    return handler.respond(request);
  }
}

export class StubTokenClient implements TokenClient {
  readonly calls: string[] = [];
  private counter = 0;

  constructor(private readonly clock: Clock, private readonly failure: Error | null = null) {}

  async refreshAccessToken(refreshToken: string): Promise<RefreshedToken> {
    this.calls.push(refreshToken);
    if (this.failure) throw this.failure;
    this.counter += 1;
    return {
      accessToken: `fresh-access-${this.counter}`,
      refreshToken: null,
      expiresAt: new Date(this.clock().getTime() + 60 * 60 * 1000)
    };
  }
}

export interface TestEngine {
  engine: CalendarSyncEngine;
  clock: TestClock;
  credentials: InMemoryCredentialStore;
  calendars: InMemoryCalendarStore;
  transport: ScriptedTransport;
  tokenClient: StubTokenClient;
}

export function createTestEngine(options: { tokenFailure?: Error; untitledEventTitle?: string | null } = {}): TestEngine {
  const clock = createTestClock();
  const credentials = new InMemoryCredentialStore();
  const calendars = new InMemoryCalendarStore(clock.now);
  const transport = new ScriptedTransport();
  const tokenClient = new StubTokenClient(clock.now, options.tokenFailure ?? null);
  const engine = createCalendarSyncEngine({
    config: {
      calendarApiBaseUrl: 'https://calendar.test/v3',
      tokenEndpoint: 'https://calendar.test/token',
      untitledEventTitle: options.untitledEventTitle ?? null
    },
    credentials,
    calendars,
    transport,
    tokenClient,
    clock: clock.now,
    logger: silentLogger
  });
  return { engine, clock, credentials, calendars, transport, tokenClient };
}
