/**
 * Target Discovery
 *
 * Resolves the WebSocket debugger URL of a browsing context through the
 * browser's HTTP discovery endpoint.
 *
 * Preference order:
 * 1. a `page` target exposing a debugger URL
 * 2. any target exposing a debugger URL
 * 3. ask the browser for a new tab, then list once more
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { sleep } from '../utils/delay.js';
import { noTargetAvailableMessage } from '../utils/error-messages.js';
import { NoTargetAvailableError, errorMessage } from './cdp-errors.js';
import type { CdpTarget } from '../types/cdp.js';

const log = logger.discovery;

const targetSchema = z
  .object({
    id: z.string().optional(),
    type: z.string(),
    title: z.string().optional(),
    url: z.string().optional(),
    webSocketDebuggerUrl: z.string().optional(),
  })
  .passthrough();

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface DiscoveryOptions {
  host: string;
  port: number;
  requestTimeoutMs?: number;
  newTargetSettleMs?: number;
  fetchImpl?: FetchLike;
}

export interface DiscoveredTarget {
  target: CdpTarget;
  webSocketDebuggerUrl: string;
}

/**
 * Pick the best target from a listing, or null when none exposes a
 * debugger URL.
 */
export function selectTarget(targets: CdpTarget[]): DiscoveredTarget | null {
  const page = targets.find((t) => t.type === 'page' && t.webSocketDebuggerUrl);
  const chosen = page ?? targets.find((t) => t.webSocketDebuggerUrl);
  if (!chosen?.webSocketDebuggerUrl) {
    return null;
  }
  return { target: chosen, webSocketDebuggerUrl: chosen.webSocketDebuggerUrl };
}

/**
 * List targets. Unreachable endpoints, non-2xx answers and malformed
 * bodies all read as an empty listing.
 */
export async function listTargets(options: DiscoveryOptions): Promise<CdpTarget[]> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = `http://${options.host}:${options.port}/json`;

  try {
    const response = await fetchImpl(url, {
      signal: AbortSignal.timeout(options.requestTimeoutMs ?? TIMEOUTS.DISCOVERY_REQUEST),
    });
    if (!response.ok) {
      log.warn('Target listing returned non-OK status', { url, status: response.status });
      return [];
    }
    const body: unknown = await response.json();
    if (!Array.isArray(body)) {
      return [];
    }
    const targets: CdpTarget[] = [];
    for (const entry of body) {
      const parsed = targetSchema.safeParse(entry);
      if (parsed.success) {
        targets.push(parsed.data);
      }
    }
    return targets;
  } catch (error) {
    log.debug('Target listing failed', { url, error: errorMessage(error) });
    return [];
  }
}

/**
 * Ask the browser to open a blank tab. Newer Chromium builds reject GET
 * on /json/new with 405, so PUT is tried second.
 */
async function requestNewTarget(options: DiscoveryOptions): Promise<void> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = `http://${options.host}:${options.port}/json/new?`;
  const timeoutMs = options.requestTimeoutMs ?? TIMEOUTS.DISCOVERY_REQUEST;

  for (const method of ['GET', 'PUT']) {
    try {
      const response = await fetchImpl(url, { method, signal: AbortSignal.timeout(timeoutMs) });
      if (response.status !== 405) {
        return;
      }
    } catch (error) {
      log.debug('New target request failed', { url, method, error: errorMessage(error) });
      return;
    }
  }
}

export async function discoverTarget(options: DiscoveryOptions): Promise<DiscoveredTarget> {
  const first = selectTarget(await listTargets(options));
  if (first) {
    log.debug('Selected target', { type: first.target.type, targetId: first.target.id });
    return first;
  }

  log.info('No debuggable target listed, requesting a new one', {
    host: options.host,
    port: options.port,
  });
  await requestNewTarget(options);
  await sleep(options.newTargetSettleMs ?? TIMEOUTS.NEW_TARGET_SETTLE);

  const retried = selectTarget(await listTargets(options));
  if (retried) {
    return retried;
  }

  throw new NoTargetAvailableError(noTargetAvailableMessage(options.host, options.port));
}
