/**
 * Shared TypeScript types for calsync
 * Used by the backend and by API clients
 */

// ========== ACCOUNTS ==========

export type AccountProvider = 'google';

export interface Account {
  id: number;
  userId: number;
  provider: AccountProvider;
  accessToken: string | null;
  refreshToken: string | null;
  expiresAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface AccountTokens {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date | null;
}

// ========== CALENDARS ==========

export type CalendarProvider = 'google' | 'ics';
export type CalendarVisibility = 'public' | 'private';
export type CalendarSyncStatus = 'never_synced' | 'full_sync_complete' | 'incremental_sync';

export interface CalendarSyncState {
  status: CalendarSyncStatus;
  cursor: string | null;
  lastFullSyncAt: Date | null;
  lastCheckedAt: Date | null;
}

export interface Calendar {
  id: number;
  userId: number;
  sourceId: string | null;
  provider: CalendarProvider;
  summary: string;
  timeZone: string;
  description: string | null;
  color: string | null;
  visibility: CalendarVisibility;
  redaction: string | null;
  sync: CalendarSyncState;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewCalendar {
  userId: number;
  sourceId: string | null;
  provider: CalendarProvider;
  summary: string;
  timeZone: string;
  description: string | null;
  color: string | null;
  visibility: CalendarVisibility;
  redaction: string | null;
  sync: CalendarSyncState;
}

export interface CalendarSettingsUpdate {
  visibility?: CalendarVisibility;
  redaction?: string | null;
  color?: string | null;
}

// ========== EVENTS ==========

export type CalendarEventVisibility = 'public' | 'private' | 'inherited';

export interface NewCalendarEvent {
  calendarId: number;
  sourceId: string;
  title: string;
  startAt: Date;
  endAt: Date;
  allDay: boolean;
  location: string | null;
  description: string | null;
  color: string | null;
  visibility: CalendarEventVisibility;
}

export interface CalendarEvent extends NewCalendarEvent {
  id: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface CalendarWithEvents {
  calendar: Calendar;
  events: CalendarEvent[];
}

export interface CalendarEventsView {
  calendars: CalendarWithEvents[];
  synced: boolean;
}

// ========== REMOTE PROVIDER ==========

export interface RemoteCalendarSummary {
  id: string;
  summary: string;
  description: string | null;
  timeZone: string;
  backgroundColor: string | null;
  primary: boolean;
  accessRole: string | null;
  imported: boolean;
}

export interface StaticImportResult {
  calendar: Calendar;
  eventsCount: number;
}
