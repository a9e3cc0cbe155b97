import type { Calendar } from '@calsync/shared';
import type { ChangeApplier } from './applier.js';
import type { CredentialRefresher } from './auth.js';
import type { ChangeClassifier } from './classifier.js';
import { SyncCursorInvalidError, isUnauthorizedProviderError } from './errors.js';
import type { FetchResult, RemoteEventFetcher } from './fetcher.js';
import { describeError, type Logger } from './logger.js';
import type { SyncStrategySelector } from './strategy.js';
import type {
  AuthenticatedAccount,
  CalendarStore,
  CalendarSyncSummary,
  Clock,
  CredentialStore,
  SyncMode
} from './types.js';

export interface SyncOptions {
  force?: boolean;
  signal?: AbortSignal;
}

export interface CalendarSyncOrchestratorDeps {
  credentials: CredentialStore;
  calendars: CalendarStore;
  refresher: CredentialRefresher;
  selector: SyncStrategySelector;
  fetcher: RemoteEventFetcher;
  classifier: ChangeClassifier;
  applier: ChangeApplier;
  logger: Logger;
  clock: Clock;
  freshnessWindowMs: number;
}

interface InFlightPass {
  force: boolean;
  signal?: AbortSignal;
  promise: Promise<boolean>;
}

/** Credentials shared by every calendar pass of one sweep; replaced on forced refresh. */
interface SweepSession {
  auth: AuthenticatedAccount;
}

export class CalendarSyncOrchestrator {
  private readonly credentials: CredentialStore;
  private readonly calendars: CalendarStore;
  private readonly refresher: CredentialRefresher;
  private readonly selector: SyncStrategySelector;
  private readonly fetcher: RemoteEventFetcher;
  private readonly classifier: ChangeClassifier;
  private readonly applier: ChangeApplier;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly freshnessWindowMs: number;
  private readonly inFlight = new Map<number, InFlightPass>();

  constructor(deps: CalendarSyncOrchestratorDeps) {
    this.credentials = deps.credentials;
    this.calendars = deps.calendars;
    this.refresher = deps.refresher;
    this.selector = deps.selector;
    this.fetcher = deps.fetcher;
    this.classifier = deps.classifier;
    this.applier = deps.applier;
    this.logger = deps.logger;
    this.clock = deps.clock;
    this.freshnessWindowMs = deps.freshnessWindowMs;
  }

  isStale(calendar: Calendar): boolean {
    const lastChecked = calendar.sync.lastCheckedAt;
    if (!lastChecked) {
      return true;
    }
    return this.clock().getTime() - lastChecked.getTime() > this.freshnessWindowMs;
  }

  isSweepable(calendar: Calendar): calendar is Calendar & { sourceId: string } {
    return calendar.provider === 'google' && calendar.sourceId !== null;
  }

  /** Static calendars never go stale: the sweep skips them. */
  needsSync(calendars: Calendar[], force: boolean): boolean {
    if (force || calendars.length === 0) {
      return true;
    }
    return calendars.some((calendar) => this.isSweepable(calendar) && this.isStale(calendar));
  }

  /**
   * Brings the user's remote calendars up to date when any of them is stale.
   * Resolves to true when at least one calendar pass was attempted; never
   * rejects, so callers can always fall back to stored data.
   *
   * A call joins the pass already running for the user when that pass covers
   * it: same abort signal, and forced if this call is forced. Otherwise the
   * call queues its own pass behind the running one.
   */
  syncIfNeeded(userId: number, options: SyncOptions = {}): Promise<boolean> {
    const force = options.force ?? false;
    const running = this.inFlight.get(userId);
    if (running && (running.force || !force) && running.signal === options.signal) {
      this.logger.debug('Joining in-flight sync', { userId });
      return running.promise;
    }
    return this.enqueue(userId, force, options.signal);
  }

  /**
   * Starts a pass that begins after any pass already running for the user,
   * so it sees every calendar stored before this call.
   */
  syncAfterPending(userId: number, options: SyncOptions = {}): Promise<boolean> {
    return this.enqueue(userId, options.force ?? false, options.signal);
  }

  private enqueue(userId: number, force: boolean, signal?: AbortSignal): Promise<boolean> {
    const previous = this.inFlight.get(userId);
    const run = previous
      ? previous.promise.then(async (previousSynced) => {
          const synced = await this.runSync(userId, force, signal);
          // A queued unforced call is also served by the pass it waited for.
          return synced || (!force && previousSynced);
        })
      : this.runSync(userId, force, signal);

    const entry: InFlightPass = {
      force,
      signal,
      promise: run.finally(() => {
        if (this.inFlight.get(userId) === entry) {
          this.inFlight.delete(userId);
        }
      })
    };
    this.inFlight.set(userId, entry);
    return entry.promise;
  }

  private async runSync(userId: number, force: boolean, signal?: AbortSignal): Promise<boolean> {
    try {
      const calendars = await this.calendars.listCalendarsByUser(userId);
      if (!this.needsSync(calendars, force)) {
        this.logger.debug('Using cached data, no sync needed', { userId });
        return false;
      }

      this.logger.info(force ? 'Performing forced sync' : 'Performing sync, cache expired', { userId });

      const account = await this.credentials.getAccount(userId, 'google');
      if (!account) {
        this.logger.info('No connected account, using cached data', { userId });
        return false;
      }

      let auth: AuthenticatedAccount;
      try {
        auth = await this.refresher.ensureAccessToken(account, signal);
      } catch (error) {
        this.logger.error('Failed to obtain access token, using cached data', {
          userId,
          error: describeError(error)
        });
        return false;
      }

      const session: SweepSession = { auth };
      let attempted = 0;
      let succeeded = 0;

      for (const calendar of calendars) {
        if (!this.isSweepable(calendar)) {
          continue;
        }
        if (!force && !this.isStale(calendar)) {
          continue;
        }

        attempted += 1;
        try {
          const summary = await this.syncCalendar(session, calendar, calendar.sourceId, force, signal);
          succeeded += 1;
          this.logger.info('Synced calendar', { userId, ...summary });
        } catch (error) {
          this.logger.error('Failed to sync calendar events', {
            userId,
            calendarId: calendar.id,
            error: describeError(error)
          });
        }
      }

      if (attempted > 0) {
        this.logger.info('Calendar sync completed', { userId, attempted, succeeded });
      }
      return attempted > 0;
    } catch (error) {
      this.logger.error('Calendar sync aborted, using cached data', { userId, error: describeError(error) });
      return false;
    }
  }

  /**
   * One calendar pass. The sync-state write at the end is the last store
   * mutation, so a pass that dies earlier leaves the calendar stale.
   */
  private async syncCalendar(
    session: SweepSession,
    calendar: Calendar,
    sourceId: string,
    force: boolean,
    signal?: AbortSignal
  ): Promise<CalendarSyncSummary> {
    let mode = await this.selector.beginPass(calendar, force);

    let fetched: FetchResult;
    try {
      fetched = await this.fetchWithAuthRetry(session, sourceId, mode, signal);
    } catch (error) {
      if (!(error instanceof SyncCursorInvalidError)) {
        throw error;
      }
      mode = await this.selector.invalidateCursor(calendar);
      fetched = await this.fetchWithAuthRetry(session, sourceId, mode, signal);
    }

    const local = await this.calendars.listEventsByCalendar(calendar.id);
    const changes = this.classifier.classify(calendar.id, fetched.items, local);
    const applied = await this.applier.apply(calendar.id, changes);
    const cursorStored = await this.selector.completePass(calendar, mode, fetched.nextCursor);

    return {
      calendarId: calendar.id,
      mode: mode.kind,
      fetched: fetched.items.length,
      skipped: changes.skipped + fetched.malformed,
      created: applied.created,
      updated: applied.updated,
      deletions: applied.deletions,
      cursorStored
    };
  }

  private async fetchWithAuthRetry(
    session: SweepSession,
    sourceId: string,
    mode: SyncMode,
    signal?: AbortSignal
  ): Promise<FetchResult> {
    try {
      return await this.fetcher.fetchEvents(session.auth.accessToken, sourceId, mode, signal);
    } catch (error) {
      if (!isUnauthorizedProviderError(error)) {
        throw error;
      }
      this.logger.warn('Provider rejected access token, forcing refresh and retrying', {
        userId: session.auth.account.userId,
        sourceId
      });
      session.auth = await this.refresher.forceRefresh(session.auth.account, signal);
      return this.fetcher.fetchEvents(session.auth.accessToken, sourceId, mode, signal);
    }
  }
}
