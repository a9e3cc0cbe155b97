const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

function parseDuration(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function parseOptionalText(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export interface CalendarSyncConfig {
  /** How long a calendar's last check stays fresh before a read triggers a sync. */
  freshnessWindowMs: number;
  /** A calendar whose last full sync is older than this gets a full pass. */
  fullSyncIntervalMs: number;
  tokenRefreshSkewMs: number;
  fullSyncLookbackDays: number;
  fullSyncLookaheadDays: number;
  requestTimeoutMs: number;
  pageSize: number;
  maxRangeMonths: number;
  /** Title given to remote events without one; null drops them instead. */
  untitledEventTitle: string | null;
  calendarApiBaseUrl: string;
  tokenEndpoint: string;
}

export function getCalendarSyncConfig(): CalendarSyncConfig {
  return {
    freshnessWindowMs: parseDuration(process.env.CALENDAR_SYNC_FRESHNESS_MS, MINUTE_MS),
    fullSyncIntervalMs: parseDuration(process.env.CALENDAR_SYNC_FULL_INTERVAL_MS, 24 * HOUR_MS),
    tokenRefreshSkewMs: parseDuration(process.env.CALENDAR_SYNC_TOKEN_SKEW_MS, 5 * MINUTE_MS),
    fullSyncLookbackDays: parseDuration(process.env.CALENDAR_SYNC_LOOKBACK_DAYS, 30),
    fullSyncLookaheadDays: parseDuration(process.env.CALENDAR_SYNC_LOOKAHEAD_DAYS, 365),
    requestTimeoutMs: parseDuration(process.env.CALENDAR_SYNC_REQUEST_TIMEOUT_MS, 15_000),
    pageSize: parseDuration(process.env.CALENDAR_SYNC_PAGE_SIZE, 2500),
    maxRangeMonths: 3,
    untitledEventTitle: parseOptionalText(process.env.CALENDAR_SYNC_UNTITLED_TITLE),
    calendarApiBaseUrl: process.env.GOOGLE_CALENDAR_API_URL ?? 'https://www.googleapis.com/calendar/v3',
    tokenEndpoint: process.env.GOOGLE_TOKEN_ENDPOINT ?? 'https://oauth2.googleapis.com/token'
  };
}
