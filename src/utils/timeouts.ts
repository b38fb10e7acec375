/**
 * Central Timeout Configuration
 *
 * All fixed delays and timeouts used by the CDP client and the search
 * pipeline live here.
 */

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Discovery HTTP request (`/json`, `/json/new`)
   */
  DISCOVERY_REQUEST: 1000,

  /**
   * Pause after asking the browser for a new target before listing again
   */
  NEW_TARGET_SETTLE: 200,

  /**
   * WebSocket handshake with the target's debugger endpoint
   */
  HANDSHAKE: 3000,

  /**
   * Time to wait for the response frame of a single command.
   * Expiry is treated as a transport failure.
   */
  COMMAND_RESPONSE: 30000,

  /**
   * Fixed settle delay after Page.navigate. Not event-driven: callers that
   * need readiness follow up with waitForSelector.
   */
  NAVIGATION_SETTLE: 2000,

  /**
   * Default waitForSelector budget
   */
  SELECTOR_WAIT: 10000,

  /**
   * waitForSelector poll interval
   */
  SELECTOR_POLL_INTERVAL: 500,

  /**
   * Wait for the results container on each search page
   */
  SEARCH_RESULTS_WAIT: 10000,

  /**
   * Pause after the lazy-load scroll on a results page
   */
  SCROLL_SETTLE: 2000,
} as const;
