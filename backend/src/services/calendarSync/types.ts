import type {
  Account,
  AccountProvider,
  AccountTokens,
  Calendar,
  CalendarEvent,
  CalendarSettingsUpdate,
  CalendarSyncStatus,
  NewCalendar,
  NewCalendarEvent
} from '@calsync/shared';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * How a single calendar pass talks to the provider. Resolved once by the
 * strategy selector and threaded through fetch, classify and the final
 * sync-state write.
 */
export type SyncMode =
  | { kind: 'full' }
  | { kind: 'incremental'; cursor: string }
  | { kind: 'recovery_full' };

export function isFullMode(mode: SyncMode): boolean {
  return mode.kind !== 'incremental';
}

export interface CredentialStore {
  getAccount(userId: number, provider: AccountProvider): Promise<Account | null>;
  updateAccountTokens(userId: number, provider: AccountProvider, tokens: AccountTokens): Promise<Account>;
  upsertAccount(userId: number, provider: AccountProvider, tokens: AccountTokens): Promise<Account>;
}

export interface SyncPassUpdate {
  status: CalendarSyncStatus;
  cursor: string | null;
  /** Only set by full passes; incremental passes keep the stored value. */
  lastFullSyncAt?: Date;
  lastCheckedAt: Date;
}

export interface CalendarStore {
  listCalendarsByUser(userId: number): Promise<Calendar[]>;
  findCalendarById(calendarId: number): Promise<Calendar | null>;
  findCalendarBySource(
    userId: number,
    sourceId: string,
    options?: { includeDeleted?: boolean }
  ): Promise<(Calendar & { deleted: boolean }) | null>;
  createCalendar(input: NewCalendar): Promise<Calendar>;
  reviveCalendar(calendarId: number, input: NewCalendar): Promise<Calendar>;
  updateCalendarSettings(calendarId: number, patch: CalendarSettingsUpdate): Promise<Calendar | null>;
  softDeleteCalendar(calendarId: number): Promise<boolean>;

  clearSyncCursor(calendarId: number): Promise<void>;
  completeSyncPass(calendarId: number, update: SyncPassUpdate): Promise<void>;

  listEventsByCalendar(calendarId: number): Promise<CalendarEvent[]>;
  listEventsInRange(calendarIds: number[], start: Date, end: Date): Promise<CalendarEvent[]>;
  createEvents(events: NewCalendarEvent[]): Promise<number>;
  updateEvents(events: CalendarEvent[]): Promise<number>;
  deleteEventBySource(calendarId: number, sourceId: string): Promise<boolean>;
}

export interface AuthenticatedAccount {
  account: Account;
  accessToken: string;
}

export interface ChangeSet {
  toCreate: NewCalendarEvent[];
  toUpdate: CalendarEvent[];
  toDelete: string[];
  skipped: number;
}

export type ApplyStage = 'create' | 'update' | 'delete';

export interface SyncItemError {
  stage: ApplyStage;
  sourceId?: string;
  message: string;
}

export interface DeletionSummary {
  attempted: number;
  succeeded: number;
  failed: number;
}

export interface ApplySummary {
  created: number;
  updated: number;
  deletions: DeletionSummary;
  errors: SyncItemError[];
}

export interface CalendarSyncSummary {
  calendarId: number;
  mode: SyncMode['kind'];
  fetched: number;
  skipped: number;
  created: number;
  updated: number;
  deletions: DeletionSummary;
  cursorStored: boolean;
}
