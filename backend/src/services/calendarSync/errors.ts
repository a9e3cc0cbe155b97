export class CalendarSyncException extends Error {
  status?: number;
  code?: string;
  context?: Record<string, unknown>;

  constructor(message: string, status?: number, code?: string, context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.context = context;
  }
}

/** Non-2xx answer from the provider that is not a cursor invalidation. */
export class ProviderRequestError extends CalendarSyncException {}

/** The provider no longer accepts the stored sync cursor (HTTP 410). */
export class SyncCursorInvalidError extends CalendarSyncException {
  constructor(context?: Record<string, unknown>) {
    super('Sync cursor is no longer valid; a full sync is required', 410, 'sync_cursor_invalid', context);
  }
}

export type CredentialRefreshFailure = 'not_connected' | 'missing_refresh_token' | 'refresh_failed' | 'empty_access_token';

export class CredentialRefreshError extends CalendarSyncException {
  readonly reason: CredentialRefreshFailure;

  constructor(message: string, reason: CredentialRefreshFailure, status?: number, context?: Record<string, unknown>) {
    super(message, status, reason, context);
    this.reason = reason;
  }
}

export function isUnauthorizedProviderError(error: unknown): boolean {
  return error instanceof ProviderRequestError && error.status === 401;
}
