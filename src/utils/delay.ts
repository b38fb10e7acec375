/**
 * Sleep helpers shared by the page driver and the search loop
 */

/**
 * Resolve after `ms` milliseconds. Resolves early (never rejects) when
 * `signal` aborts, so polling loops can check the signal themselves.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Pick a delay uniformly in [minMs, maxMs].
 */
export function randomDelayMs(minMs: number, maxMs: number, random: () => number = Math.random): number {
  if (maxMs <= minMs) {
    return minMs;
  }
  return Math.round(minMs + random() * (maxMs - minMs));
}
