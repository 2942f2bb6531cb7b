/**
 * src/config/crawlPolicy.ts
 *
 * The tunables that shape a crawl run. Every component that needs a threshold
 * (orchestrator, health tracker, reconciler) receives it from a CrawlPolicy
 * instead of reading process.env on its own, so tests can pass small values.
 */

import type { Env } from './envSchema.js';

export interface RetryPolicy {
    /** Total attempts per adapter call, including the first one. */
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    multiplier: number;
    jitterMs: number;
}

export interface CrawlPolicy {
    concurrency: number;
    sourceTimeoutMs: number;
    runTimeoutMs: number;
    retry: RetryPolicy;
    failureDeactivationThreshold: number;
    emptyCrawlDeactivationThreshold: number;
    /** Runs a source must have on record before empty streaks can deactivate it. */
    graceRuns: number;
    healthWindowSize: number;
    archiveAfterMisses: number;
    /** A `running` run older than this is treated as abandoned by a dead process. */
    staleRunAfterMs: number;
    aiBudgetChars: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 3,
    baseDelayMs: 300,
    maxDelayMs: 5_000,
    multiplier: 2,
    jitterMs: 150,
};

export const DEFAULT_CRAWL_POLICY: CrawlPolicy = {
    concurrency: 5,
    sourceTimeoutMs: 60_000,
    runTimeoutMs: 30 * 60_000,
    retry: DEFAULT_RETRY_POLICY,
    failureDeactivationThreshold: 3,
    emptyCrawlDeactivationThreshold: 5,
    graceRuns: 3,
    healthWindowSize: 20,
    archiveAfterMisses: 3,
    staleRunAfterMs: 2 * 60 * 60_000,
    aiBudgetChars: 10_000,
};

export function crawlPolicyFromEnv(env: Env): CrawlPolicy {
    return {
        concurrency: env.CRAWL_CONCURRENCY,
        sourceTimeoutMs: env.SOURCE_TIMEOUT_MS,
        runTimeoutMs: env.RUN_TIMEOUT_MS,
        retry: {
            maxAttempts: env.RETRY_MAX_ATTEMPTS,
            baseDelayMs: env.RETRY_BASE_DELAY_MS,
            maxDelayMs: env.RETRY_MAX_DELAY_MS,
            multiplier: DEFAULT_RETRY_POLICY.multiplier,
            jitterMs: env.RETRY_JITTER_MS,
        },
        failureDeactivationThreshold: env.FAILURE_DEACTIVATION_THRESHOLD,
        emptyCrawlDeactivationThreshold: env.EMPTY_CRAWL_DEACTIVATION_THRESHOLD,
        graceRuns: env.HEALTH_GRACE_RUNS,
        healthWindowSize: env.HEALTH_WINDOW_SIZE,
        archiveAfterMisses: env.POSTING_ARCHIVE_AFTER_MISSES,
        staleRunAfterMs: env.STALE_RUN_AFTER_MS,
        aiBudgetChars: env.AI_HTML_BUDGET_CHARS,
    };
}
