import type { CalendarStore, CredentialStore } from '../services/calendarSync/types.js';
import * as accounts from './queries/accounts.js';
import * as calendars from './queries/calendars.js';
import * as events from './queries/events.js';

export { createUser, findUserById, userRowToUser } from './queries/users.js';
export type { User } from './queries/users.js';

export { accountRowToAccount, getAccount, updateAccountTokens, upsertAccount } from './queries/accounts.js';

export {
  calendarRowToCalendar,
  clearSyncCursor,
  completeSyncPass,
  createCalendar,
  findCalendarById,
  findCalendarBySource,
  listCalendarsByUser,
  reviveCalendar,
  softDeleteCalendar,
  updateCalendarSettings
} from './queries/calendars.js';
export type { CalendarRow } from './queries/calendars.js';

export {
  createEvents,
  deleteEventBySource,
  eventRowToEvent,
  listEventsByCalendar,
  listEventsInRange,
  updateEvents
} from './queries/events.js';

export const pgCredentialStore: CredentialStore = {
  getAccount: accounts.getAccount,
  updateAccountTokens: accounts.updateAccountTokens,
  upsertAccount: accounts.upsertAccount
};

export const pgCalendarStore: CalendarStore = {
  listCalendarsByUser: calendars.listCalendarsByUser,
  findCalendarById: calendars.findCalendarById,
  findCalendarBySource: calendars.findCalendarBySource,
  createCalendar: calendars.createCalendar,
  reviveCalendar: calendars.reviveCalendar,
  updateCalendarSettings: calendars.updateCalendarSettings,
  softDeleteCalendar: calendars.softDeleteCalendar,
  clearSyncCursor: calendars.clearSyncCursor,
  completeSyncPass: calendars.completeSyncPass,
  listEventsByCalendar: events.listEventsByCalendar,
  listEventsInRange: events.listEventsInRange,
  createEvents: events.createEvents,
  updateEvents: events.updateEvents,
  deleteEventBySource: events.deleteEventBySource
};
