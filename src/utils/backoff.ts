/**
 * src/utils/backoff.ts
 *
 * Exponential backoff for transient adapter failures.
 *
 * Backoff formula:
 *   delay = min(baseDelayMs × multiplier^(attempt-1) + jitter, maxDelayMs)
 *
 * `attempt` is the 1-based number of the attempt that just failed.
 */

import type { RetryPolicy } from '../config/crawlPolicy.js';

export function computeBackoffDelay(
    attempt: number,
    policy: RetryPolicy,
    random: () => number = Math.random
): number {
    const exponent = Math.max(0, attempt - 1);
    const jitter = Math.floor(random() * policy.jitterMs);
    return Math.min(policy.baseDelayMs * policy.multiplier ** exponent + jitter, policy.maxDelayMs);
}

/**
 * Parses a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 * Returns null when the header is absent or unreadable.
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | null {
    if (!value) return null;
    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
    const at = Date.parse(trimmed);
    if (Number.isNaN(at)) return null;
    return Math.max(0, at - now);
}

/** Sleeps for `ms`, rejecting early with the signal's reason if it aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
