export interface RouterMeta {
  basePath: string;
  scope: 'public' | 'api';
  description: string;
}

export interface RouteMeta {
  method: 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';
  path: string;
  description: string;
}

export const ROUTER_METADATA: RouterMeta[] = [
  { basePath: '/api/calendars', scope: 'api', description: 'Imported calendars, events and ICS imports' },
  { basePath: '/api/integrations/google', scope: 'api', description: 'Google Calendar integration APIs' },
  { basePath: '/api/users', scope: 'public', description: 'Public profile event APIs' }
];

export const API_ROUTE_METADATA: RouteMeta[] = [
  { method: 'GET', path: '/api/calendars', description: 'List imported calendars, syncing stale ones first' },
  { method: 'GET', path: '/api/calendars/events', description: 'Events in a time window, grouped by calendar' },
  { method: 'POST', path: '/api/calendars/ics', description: 'Import an ICS document as a static calendar' },
  { method: 'PATCH', path: '/api/calendars/:calendarId', description: 'Update calendar visibility, redaction or color' },
  { method: 'DELETE', path: '/api/calendars/:calendarId', description: 'Delete a calendar and its events' },
  { method: 'POST', path: '/api/integrations/google/connect', description: 'Store Google OAuth tokens' },
  { method: 'GET', path: '/api/integrations/google/calendars', description: 'List remote Google calendars' },
  { method: 'POST', path: '/api/integrations/google/calendars/import', description: 'Import one Google calendar and sync it' },
  { method: 'GET', path: '/api/users/:userId/events', description: 'Public events of a user, redacted' }
];
