import { describeError, type Logger } from './logger.js';
import type { ApplySummary, CalendarStore, ChangeSet, SyncItemError } from './types.js';

export class ChangeApplier {
  private readonly store: CalendarStore;
  private readonly logger: Logger;

  constructor(deps: { store: CalendarStore; logger: Logger }) {
    this.store = deps.store;
    this.logger = deps.logger;
  }

  /** Never throws; each stage fails on its own and is reported in the summary. */
  async apply(calendarId: number, changes: ChangeSet): Promise<ApplySummary> {
    const errors: SyncItemError[] = [];
    let created = 0;
    let updated = 0;

    if (changes.toCreate.length > 0) {
      try {
        created = await this.store.createEvents(changes.toCreate);
        this.logger.info('Created new events', { calendarId, count: created });
      } catch (error) {
        this.logger.error('Failed to create new events', {
          calendarId,
          count: changes.toCreate.length,
          error: describeError(error)
        });
        errors.push({ stage: 'create', message: describeError(error) });
      }
    }

    if (changes.toUpdate.length > 0) {
      try {
        updated = await this.store.updateEvents(changes.toUpdate);
        this.logger.info('Updated existing events', { calendarId, count: updated });
      } catch (error) {
        this.logger.error('Failed to update existing events', {
          calendarId,
          count: changes.toUpdate.length,
          error: describeError(error)
        });
        errors.push({ stage: 'update', message: describeError(error) });
      }
    }

    let succeeded = 0;
    for (const sourceId of changes.toDelete) {
      try {
        await this.store.deleteEventBySource(calendarId, sourceId);
        succeeded += 1;
      } catch (error) {
        this.logger.warn('Failed to delete event', { calendarId, sourceId, error: describeError(error) });
        errors.push({ stage: 'delete', sourceId, message: describeError(error) });
      }
    }

    const attempted = changes.toDelete.length;
    if (attempted > 0) {
      this.logger.info('Processed event deletions', {
        calendarId,
        attempted,
        succeeded,
        failed: attempted - succeeded
      });
    }

    return {
      created,
      updated,
      deletions: { attempted, succeeded, failed: attempted - succeeded },
      errors
    };
  }
}
