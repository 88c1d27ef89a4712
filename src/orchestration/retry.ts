/**
 * Orchestrator — Retry Backoff
 *
 * Exponential backoff between attempts of a step, plus the abortable
 * timers the executor waits on.
 */

// =============================================================================
// Configuration
// =============================================================================

export type BackoffOptions = {
  baseMs: number;
  maxMs: number;
  /** Fraction of the delay applied as random +/- jitter. */
  jitterFactor: number;
};

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseMs: 2_000,
  maxMs: 60_000,
  jitterFactor: 0,
};

/**
 * Delay before the attempt following `attempt` (1-based):
 * base, 2·base, 4·base … capped at maxMs.
 */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions = DEFAULT_BACKOFF,
  random: () => number = Math.random,
): number {
  const exponential = options.baseMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(exponential, options.maxMs);
  if (options.jitterFactor <= 0) return capped;
  const jitter = capped * options.jitterFactor * (random() * 2 - 1);
  return Math.max(0, Math.min(options.maxMs, Math.round(capped + jitter)));
}

// =============================================================================
// Abortable Timers
// =============================================================================

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Combine several signals into one that aborts when any of them does.
 */
export function anySignal(signals: AbortSignal[]): AbortSignal {
  const controller = new AbortController();
  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      return controller.signal;
    }
    signal.addEventListener("abort", () => controller.abort(signal.reason), { once: true });
  }
  return controller.signal;
}
