import type { CalendarEvent, NewCalendarEvent } from '@calsync/shared';
import { convertRemoteEvent, isCancelled } from './eventTransforms.js';
import type { Logger } from './logger.js';
import type { RemoteEvent } from './remoteSchemas.js';
import type { ChangeSet } from './types.js';

export interface ChangeClassifierDeps {
  logger: Logger;
  untitledTitle: string | null;
}

/**
 * Diffs remote items against the calendar's local rows, keyed by source id.
 * Later occurrences of an id in the same batch replace earlier ones.
 */
export class ChangeClassifier {
  private readonly logger: Logger;
  private readonly untitledTitle: string | null;

  constructor(deps: ChangeClassifierDeps) {
    this.logger = deps.logger;
    this.untitledTitle = deps.untitledTitle;
  }

  classify(calendarId: number, remote: RemoteEvent[], local: CalendarEvent[]): ChangeSet {
    const localBySource = new Map<string, CalendarEvent>();
    for (const row of local) {
      localBySource.set(row.sourceId, row);
    }

    const toCreate = new Map<string, NewCalendarEvent>();
    const toUpdate = new Map<string, CalendarEvent>();
    const toDelete = new Set<string>();
    let skipped = 0;

    for (const item of remote) {
      const existing = localBySource.get(item.id);

      if (isCancelled(item)) {
        toCreate.delete(item.id);
        toUpdate.delete(item.id);
        if (existing) {
          toDelete.add(item.id);
        }
        continue;
      }

      const converted = convertRemoteEvent(item, this.untitledTitle);
      if (!converted.ok) {
        skipped += 1;
        if (converted.reason === 'invalid_time') {
          this.logger.warn('Skipping event with unparsable start/end', { calendarId, sourceId: item.id });
        } else {
          this.logger.debug('Skipping event', { calendarId, sourceId: item.id, reason: converted.reason });
        }
        continue;
      }

      toDelete.delete(item.id);
      if (existing) {
        toUpdate.set(item.id, {
          ...existing,
          ...converted.event,
          calendarId,
          id: existing.id
        });
      } else {
        toCreate.set(item.id, { ...converted.event, calendarId });
      }
    }

    return {
      toCreate: [...toCreate.values()],
      toUpdate: [...toUpdate.values()],
      toDelete: [...toDelete],
      skipped
    };
  }
}
