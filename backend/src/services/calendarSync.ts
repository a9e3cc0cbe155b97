import { pgCalendarStore, pgCredentialStore } from '../db/queries.js';
import { ChangeApplier } from './calendarSync/applier.js';
import { CredentialRefresher, createTokenClient, type TokenClient } from './calendarSync/auth.js';
import { ChangeClassifier } from './calendarSync/classifier.js';
import { getCalendarSyncConfig, type CalendarSyncConfig } from './calendarSync/config.js';
import { RemoteEventFetcher } from './calendarSync/fetcher.js';
import { createFetchTransport, type ProviderTransport } from './calendarSync/http.js';
import { createLogger, type Logger } from './calendarSync/logger.js';
import { CalendarSyncOrchestrator } from './calendarSync/orchestrator.js';
import { StaticCalendarImporter } from './calendarSync/staticImporter.js';
import { SyncStrategySelector } from './calendarSync/strategy.js';
import { systemClock, type CalendarStore, type Clock, type CredentialStore } from './calendarSync/types.js';

export type { CalendarSyncConfig } from './calendarSync/config.js';
export type { SyncOptions } from './calendarSync/orchestrator.js';
export { CalendarSyncException, CredentialRefreshError, SyncCursorInvalidError } from './calendarSync/errors.js';

export interface CalendarSyncEngine {
  config: CalendarSyncConfig;
  logger: Logger;
  clock: Clock;
  credentials: CredentialStore;
  calendars: CalendarStore;
  refresher: CredentialRefresher;
  fetcher: RemoteEventFetcher;
  importer: StaticCalendarImporter;
  orchestrator: CalendarSyncOrchestrator;
}

export interface CalendarSyncEngineOptions {
  config?: Partial<CalendarSyncConfig>;
  credentials?: CredentialStore;
  calendars?: CalendarStore;
  transport?: ProviderTransport;
  tokenClient?: TokenClient;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Wires the sync components together. Every collaborator can be swapped,
 * which is how tests run the whole engine against in-memory stores and a
 * scripted provider.
 */
export function createCalendarSyncEngine(options: CalendarSyncEngineOptions = {}): CalendarSyncEngine {
  const config: CalendarSyncConfig = { ...getCalendarSyncConfig(), ...options.config };
  const logger = options.logger ?? createLogger('CalendarSync');
  const clock = options.clock ?? systemClock;
  const credentials = options.credentials ?? pgCredentialStore;
  const calendars = options.calendars ?? pgCalendarStore;
  const transport =
    options.transport ?? createFetchTransport({ logger: logger.child('Http'), timeoutMs: config.requestTimeoutMs });
  const tokenClient = options.tokenClient ?? createTokenClient({ transport, tokenEndpoint: config.tokenEndpoint, clock });

  const refresher = new CredentialRefresher({
    store: credentials,
    tokenClient,
    logger: logger.child('Credentials'),
    clock,
    refreshSkewMs: config.tokenRefreshSkewMs
  });
  const fetcher = new RemoteEventFetcher({
    transport,
    logger: logger.child('Fetcher'),
    clock,
    baseUrl: config.calendarApiBaseUrl,
    pageSize: config.pageSize,
    lookbackDays: config.fullSyncLookbackDays,
    lookaheadDays: config.fullSyncLookaheadDays
  });
  const selector = new SyncStrategySelector({
    store: calendars,
    logger: logger.child('Strategy'),
    clock,
    fullSyncIntervalMs: config.fullSyncIntervalMs
  });
  const classifier = new ChangeClassifier({
    logger: logger.child('Classifier'),
    untitledTitle: config.untitledEventTitle
  });
  const applier = new ChangeApplier({ store: calendars, logger: logger.child('Applier') });
  const importer = new StaticCalendarImporter({
    store: calendars,
    logger: logger.child('Import'),
    clock,
    untitledTitle: config.untitledEventTitle
  });
  const orchestrator = new CalendarSyncOrchestrator({
    credentials,
    calendars,
    refresher,
    selector,
    fetcher,
    classifier,
    applier,
    logger,
    clock,
    freshnessWindowMs: config.freshnessWindowMs
  });

  return { config, logger, clock, credentials, calendars, refresher, fetcher, importer, orchestrator };
}

let engine: CalendarSyncEngine | null = null;

export function getCalendarSyncEngine(): CalendarSyncEngine {
  if (!engine) {
    engine = createCalendarSyncEngine();
  }
  return engine;
}

export function __setCalendarSyncEngineForTests(next: CalendarSyncEngine | null): void {
  engine = next;
}
