import type { Account, Calendar, NewCalendar, RemoteCalendarSummary } from '@calsync/shared';
import { ConflictError, ValidationError } from '../utils/errors.js';
import { CredentialRefreshError } from './calendarSync/errors.js';
import { toRemoteCalendarSummary } from './calendarSync/fetcher.js';
import type { AuthenticatedAccount } from './calendarSync/types.js';
import { getCalendarSyncEngine } from './calendarSync.js';

export interface GoogleConnectPayload {
  accessToken: string;
  refreshToken: string;
  /** Seconds until the access token expires, as returned by the code exchange. */
  expiresIn?: number;
  expiresAt?: Date;
}

/**
 * Stores the tokens produced by the OAuth code exchange. The exchange itself
 * happens outside this service.
 */
export async function connectGoogleAccount(userId: number, payload: GoogleConnectPayload): Promise<Account> {
  const engine = getCalendarSyncEngine();
  const expiresAt =
    payload.expiresAt ??
    (payload.expiresIn !== undefined ? new Date(engine.clock().getTime() + payload.expiresIn * 1000) : null);

  const account = await engine.credentials.upsertAccount(userId, 'google', {
    accessToken: payload.accessToken,
    refreshToken: payload.refreshToken,
    expiresAt
  });
  engine.logger.info('Stored Google account tokens', { userId, expiresAt: expiresAt?.toISOString() ?? null });
  return account;
}

async function authenticate(userId: number): Promise<AuthenticatedAccount> {
  const engine = getCalendarSyncEngine();
  const account = await engine.credentials.getAccount(userId, 'google');
  if (!account) {
    throw new ValidationError({ code: 'google_not_connected', message: 'Google account is not connected' });
  }
  try {
    return await engine.refresher.ensureAccessToken(account);
  } catch (error) {
    if (error instanceof CredentialRefreshError) {
      throw new ValidationError({ code: error.reason, message: error.message });
    }
    throw error;
  }
}

export async function listRemoteCalendars(userId: number): Promise<RemoteCalendarSummary[]> {
  const engine = getCalendarSyncEngine();
  const { accessToken } = await authenticate(userId);
  const [entries, local] = await Promise.all([
    engine.fetcher.listCalendars(accessToken),
    engine.calendars.listCalendarsByUser(userId)
  ]);
  const imported = new Set(local.map((calendar) => calendar.sourceId));
  return entries.map((entry) => toRemoteCalendarSummary(entry, imported.has(entry.id)));
}

/**
 * Creates (or revives) the local calendar for one remote calendar and runs
 * its first sync. Importing a calendar that is already active is a conflict.
 */
export async function importRemoteCalendar(
  userId: number,
  calendarSourceId: string
): Promise<{ calendar: Calendar; synced: boolean }> {
  const engine = getCalendarSyncEngine();
  const existing = await engine.calendars.findCalendarBySource(userId, calendarSourceId, { includeDeleted: true });
  if (existing && !existing.deleted) {
    throw new ConflictError('Calendar already imported', { code: 'calendar_already_imported' });
  }

  const { accessToken } = await authenticate(userId);
  const remote = toRemoteCalendarSummary(await engine.fetcher.getCalendar(accessToken, calendarSourceId), false);

  const input: NewCalendar = {
    userId,
    sourceId: calendarSourceId,
    provider: 'google',
    summary: remote.summary,
    timeZone: remote.timeZone,
    description: remote.description,
    color: remote.backgroundColor,
    visibility: 'private',
    redaction: null,
    sync: { status: 'never_synced', cursor: null, lastFullSyncAt: null, lastCheckedAt: null }
  };

  const calendar = existing
    ? await engine.calendars.reviveCalendar(existing.id, input)
    : await engine.calendars.createCalendar(input);

  engine.logger.info(existing ? 'Revived Google calendar' : 'Imported Google calendar', {
    userId,
    calendarId: calendar.id,
    summary: calendar.summary
  });

  const synced = await engine.orchestrator.syncAfterPending(userId);
  const refreshed = synced ? await engine.calendars.findCalendarById(calendar.id) : null;
  return { calendar: refreshed ?? calendar, synced };
}
