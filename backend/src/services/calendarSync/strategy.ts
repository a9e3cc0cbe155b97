import type { Calendar } from '@calsync/shared';
import type { Logger } from './logger.js';
import { isFullMode, type CalendarStore, type Clock, type SyncMode } from './types.js';

export interface SyncStrategySelectorDeps {
  store: CalendarStore;
  logger: Logger;
  clock: Clock;
  fullSyncIntervalMs: number;
}

export class SyncStrategySelector {
  private readonly store: CalendarStore;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly fullSyncIntervalMs: number;

  constructor(deps: SyncStrategySelectorDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
    this.clock = deps.clock;
    this.fullSyncIntervalMs = deps.fullSyncIntervalMs;
  }

  shouldFullSync(calendar: Calendar, force: boolean): boolean {
    if (force) {
      return true;
    }
    if (calendar.sync.status === 'never_synced') {
      return true;
    }
    if (!calendar.sync.cursor) {
      return true;
    }
    const lastFull = calendar.sync.lastFullSyncAt;
    if (!lastFull) {
      return true;
    }
    return this.clock().getTime() - lastFull.getTime() > this.fullSyncIntervalMs;
  }

  resolveMode(calendar: Calendar, force: boolean): SyncMode {
    if (this.shouldFullSync(calendar, force) || !calendar.sync.cursor) {
      return { kind: 'full' };
    }
    return { kind: 'incremental', cursor: calendar.sync.cursor };
  }

  /**
   * Resolves the mode for a pass and, for full passes, clears the stored
   * cursor before anything is fetched.
   */
  async beginPass(calendar: Calendar, force: boolean): Promise<SyncMode> {
    const mode = this.resolveMode(calendar, force);
    if (isFullMode(mode) && calendar.sync.cursor) {
      await this.store.clearSyncCursor(calendar.id);
    }
    this.logger.debug('Resolved sync mode', { calendarId: calendar.id, mode: mode.kind, force });
    return mode;
  }

  async invalidateCursor(calendar: Calendar): Promise<SyncMode> {
    this.logger.warn('Sync cursor rejected by provider, clearing for full reload', {
      calendarId: calendar.id
    });
    await this.store.clearSyncCursor(calendar.id);
    return { kind: 'recovery_full' };
  }

  /** Last write of a pass: stores the new cursor and stamps the check times. */
  async completePass(calendar: Calendar, mode: SyncMode, nextCursor: string | null): Promise<boolean> {
    const now = this.clock();
    const full = isFullMode(mode);
    const cursor = nextCursor ?? (mode.kind === 'incremental' ? mode.cursor : null);

    if (!nextCursor) {
      this.logger.warn('Provider returned no sync cursor', { calendarId: calendar.id, mode: mode.kind });
    }

    await this.store.completeSyncPass(calendar.id, {
      status: full ? 'full_sync_complete' : 'incremental_sync',
      cursor,
      lastFullSyncAt: full ? now : undefined,
      lastCheckedAt: now
    });

    return nextCursor !== null;
  }
}
