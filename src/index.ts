/**
 * cdp-people-search
 *
 * Chrome DevTools Protocol client (target discovery, id-correlated
 * commands with a reconnect-once policy, page interaction primitives) and
 * a paginated, scored people-search pipeline built on it.
 *
 * @example
 * ```typescript
 * import { createBrowserSession, CandidateSearch, InMemoryCandidateStore } from 'cdp-people-search';
 *
 * const session = createBrowserSession();
 * const store = new InMemoryCandidateStore();
 * const search = new CandidateSearch(session.driver, store, session.searchConfig);
 *
 * const result = await search.search({ query: 'Backend Engineer', location: 'Berlin', targetCount: 5 });
 * await session.close();
 * ```
 */

import { parseCdpConfig, parseSearchConfig } from './utils/env-parser.js';
import { CdpConnection, discoveryFor } from './core/cdp-connection.js';
import { CommandDispatcher, DEFAULT_RECONNECT_POLICY, type ReconnectPolicy } from './core/command-dispatcher.js';
import { PageDriver, type PageDriverOptions } from './core/page-driver.js';
import type { TransportFactory } from './core/cdp-transport.js';
import type { CandidateSearchConfig } from './core/candidate-search.js';
import type { CdpConfig, SearchConfig } from './utils/config-schemas.js';

export interface BrowserSessionOptions {
  cdp?: CdpConfig;
  search?: SearchConfig;
  reconnectPolicy?: ReconnectPolicy;
  transportFactory?: TransportFactory;
  driver?: PageDriverOptions;
}

export interface BrowserSession {
  connection: CdpConnection;
  dispatcher: CommandDispatcher;
  driver: PageDriver;
  /** Search settings derived from the session's configuration */
  searchConfig: Partial<CandidateSearchConfig>;
  close(): Promise<void>;
}

/**
 * Wire discovery, connection, dispatcher and driver from configuration.
 * Nothing connects until the first command is sent.
 */
export function createBrowserSession(options: BrowserSessionOptions = {}): BrowserSession {
  const cdp = options.cdp ?? parseCdpConfig();
  const search = options.search ?? parseSearchConfig();

  const connection = new CdpConnection({
    discover: discoveryFor(cdp.host, cdp.port),
    transportFactory: options.transportFactory,
  });
  const dispatcher = new CommandDispatcher(connection, options.reconnectPolicy ?? DEFAULT_RECONNECT_POLICY);
  const driver = new PageDriver(dispatcher, options.driver);

  return {
    connection,
    dispatcher,
    driver,
    searchConfig: {
      baseUrl: search.baseUrl,
      networkFilter: search.networkFilter,
      minDelayMs: cdp.minDelayMs,
      maxDelayMs: cdp.maxDelayMs,
    },
    close: () => driver.close(),
  };
}

// Core
export { CdpConnection, REQUIRED_DOMAINS, discoveryFor } from './core/cdp-connection.js';
export { WebSocketTransport, openWebSocketTransport } from './core/cdp-transport.js';
export type { CdpTransport, TransportFactory } from './core/cdp-transport.js';
export { discoverTarget, listTargets, selectTarget } from './core/target-discovery.js';
export type { DiscoveryOptions, DiscoveredTarget, FetchLike } from './core/target-discovery.js';
export { CommandDispatcher, DEFAULT_RECONNECT_POLICY } from './core/command-dispatcher.js';
export type { CommandSender, ReconnectPolicy } from './core/command-dispatcher.js';
export { PageDriver, classifyRemoteObject, quadCenter } from './core/page-driver.js';
export type { PageDriverOptions, Point } from './core/page-driver.js';
export {
  CANDIDATE_EXTRACTION_SCRIPT,
  RESULTS_READY_SELECTOR,
  diagnoseEmptyPage,
  extractCandidatesFromPage,
  normalizeCandidates,
} from './core/candidate-extractor.js';
export { score, scoreCandidate, SCORE_WEIGHTS, SENIORITY_MARKERS, ROLE_TERMS } from './core/candidate-scorer.js';
export { CandidateSearch, buildSearchUrl, smartCandidateSearch } from './core/candidate-search.js';
export type { CandidateSearchConfig, SearchDriver } from './core/candidate-search.js';
export { InMemoryCandidateStore } from './core/candidate-store.js';
export type { CandidateStore } from './core/candidate-store.js';
export {
  BrowserSessionError,
  CommandFailureError,
  ConcurrentCommandError,
  ConnectionFailureError,
  NavigationError,
  NoTargetAvailableError,
  isTerminalSessionError,
} from './core/cdp-errors.js';

// Utils
export { loadConfig, parseCdpConfig, parseLogConfig, parseSearchConfig } from './utils/env-parser.js';
export { ConfigValidationError } from './utils/config-schemas.js';
export type { AppConfig, CdpConfig, LogConfig, SearchConfig } from './utils/config-schemas.js';
export { configureLogger, logger } from './utils/logger.js';

// Types
export type * from './types/index.js';
