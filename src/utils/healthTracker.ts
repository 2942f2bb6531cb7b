/**
 * src/utils/healthTracker.ts
 *
 * Rolling per-source health: success rate, priority score, streak counters
 * and automatic deactivation.
 *
 * STREAK MODEL
 * ────────────
 *   SourceUnreachable / Timeout / InvalidConfig → failures +1, empty +1
 *   empty (including ExtractionFailed)          → empty +1, failures reset
 *   RateLimited                                 → neither counter moves
 *   success                                     → both reset
 *   PersistenceError                            → not recorded (not the source's fault)
 *
 * DEACTIVATION
 * ────────────
 *   consecutiveFailures ≥ failureDeactivationThreshold           (always)
 *   consecutiveEmpty    ≥ emptyCrawlDeactivationThreshold        (only after graceRuns recorded runs)
 */

import { log } from 'crawlee';
import type { CrawlPolicy } from '../config/crawlPolicy.js';
import type { ErrorKind } from '../sources/errors.js';
import type { OutcomeSample, Source } from '../sources/types.js';

export type HealthThresholds = Pick<
    CrawlPolicy,
    'healthWindowSize' | 'failureDeactivationThreshold' | 'emptyCrawlDeactivationThreshold' | 'graceRuns'
>;

export interface HealthState {
    sourceId: string;
    active: boolean;
    consecutiveEmpty: number;
    consecutiveFailures: number;
    /** null while the window is empty. */
    successRate: number | null;
    priorityScore: number;
    runsRecorded: number;
    window: readonly OutcomeSample[];
    deactivationReason: string | null;
}

export interface HealthChange {
    sourceId: string;
    state: HealthState;
    /** True only on the outcome that crossed a deactivation threshold. */
    deactivated: boolean;
    reason: string | null;
}

interface Entry {
    window: OutcomeSample[];
    active: boolean;
    consecutiveEmpty: number;
    consecutiveFailures: number;
    runsRecorded: number;
    deactivationReason: string | null;
}

const FAILURE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['SourceUnreachable', 'Timeout', 'InvalidConfig']);

export const NEUTRAL_PRIORITY = 1;

function isFetchSuccess(sample: OutcomeSample): boolean {
    return (sample.status === 'success' || sample.status === 'empty') && sample.errorKind === null;
}

export function computeSuccessRate(window: readonly OutcomeSample[]): number | null {
    if (window.length === 0) return null;
    return window.filter(isFetchSuccess).length / window.length;
}

/**
 * (1 + ln(1 + avgJobsFound)) × (0.5 + 0.5 × successRate) / (1 + consecutiveEmpty),
 * halved when the latest outcome was RateLimited. Neutral for an empty window.
 */
export function computePriorityScore(window: readonly OutcomeSample[], consecutiveEmpty: number): number {
    const successRate = computeSuccessRate(window);
    if (successRate === null) return NEUTRAL_PRIORITY;

    const avgJobs = window.reduce((sum, s) => sum + s.jobsFound, 0) / window.length;
    let score = (1 + Math.log1p(avgJobs)) * (0.5 + 0.5 * successRate) / (1 + consecutiveEmpty);
    if (window[window.length - 1].errorKind === 'RateLimited') score /= 2;
    return score;
}

export class HealthTracker {
    private readonly entries = new Map<string, Entry>();

    constructor(private readonly thresholds: HealthThresholds) {}

    /** Seeds a source's state from its stored record and recent outcomes (oldest first). */
    hydrate(source: Source, history: readonly OutcomeSample[]): void {
        const recordable = history.filter((s) => s.errorKind !== 'PersistenceError');
        this.entries.set(source.id, {
            window: recordable.slice(-this.thresholds.healthWindowSize),
            active: source.active,
            consecutiveEmpty: source.consecutiveEmpty,
            consecutiveFailures: source.consecutiveFailures,
            runsRecorded: recordable.length,
            deactivationReason: source.deactivationReason,
        });
    }

    isHydrated(sourceId: string): boolean {
        return this.entries.has(sourceId);
    }

    recordOutcome(sourceId: string, outcome: OutcomeSample): HealthChange {
        const entry = this.entryFor(sourceId);
        if (outcome.errorKind === 'PersistenceError') {
            return { sourceId, state: this.toState(sourceId, entry), deactivated: false, reason: null };
        }

        entry.window.push({ status: outcome.status, errorKind: outcome.errorKind, jobsFound: outcome.jobsFound });
        if (entry.window.length > this.thresholds.healthWindowSize) {
            entry.window.splice(0, entry.window.length - this.thresholds.healthWindowSize);
        }
        entry.runsRecorded++;

        if (outcome.errorKind === 'RateLimited') {
            log.debug(`[Health] ${sourceId} rate limited; streaks unchanged`);
        } else if (outcome.errorKind !== null && FAILURE_KINDS.has(outcome.errorKind)) {
            entry.consecutiveFailures++;
            entry.consecutiveEmpty++;
        } else if (outcome.status === 'success') {
            entry.consecutiveFailures = 0;
            entry.consecutiveEmpty = 0;
        } else if (outcome.status === 'empty') {
            entry.consecutiveFailures = 0;
            entry.consecutiveEmpty++;
        } else {
            entry.consecutiveFailures++;
            entry.consecutiveEmpty++;
        }

        let reason: string | null = null;
        if (entry.active) {
            if (entry.consecutiveFailures >= this.thresholds.failureDeactivationThreshold) {
                reason = `${entry.consecutiveFailures} consecutive failed crawls (last: ${outcome.errorKind ?? outcome.status})`;
            } else if (
                entry.runsRecorded >= this.thresholds.graceRuns &&
                entry.consecutiveEmpty >= this.thresholds.emptyCrawlDeactivationThreshold
            ) {
                reason = `${entry.consecutiveEmpty} consecutive empty or failed crawls`;
            }
        }

        if (reason) {
            entry.active = false;
            entry.deactivationReason = reason;
            log.warning(`[Health] Deactivating source ${sourceId}: ${reason}`);
        }

        return { sourceId, state: this.toState(sourceId, entry), deactivated: reason !== null, reason };
    }

    currentState(sourceId: string): HealthState {
        return this.toState(sourceId, this.entryFor(sourceId));
    }

    /** Clears streaks after an operator re-enables a source. The window is kept. */
    reactivate(sourceId: string): HealthState {
        const entry = this.entryFor(sourceId);
        entry.active = true;
        entry.consecutiveEmpty = 0;
        entry.consecutiveFailures = 0;
        entry.deactivationReason = null;
        return this.toState(sourceId, entry);
    }

    private entryFor(sourceId: string): Entry {
        let entry = this.entries.get(sourceId);
        if (!entry) {
            entry = {
                window: [],
                active: true,
                consecutiveEmpty: 0,
                consecutiveFailures: 0,
                runsRecorded: 0,
                deactivationReason: null,
            };
            this.entries.set(sourceId, entry);
        }
        return entry;
    }

    private toState(sourceId: string, entry: Entry): HealthState {
        return {
            sourceId,
            active: entry.active,
            consecutiveEmpty: entry.consecutiveEmpty,
            consecutiveFailures: entry.consecutiveFailures,
            successRate: computeSuccessRate(entry.window),
            priorityScore: computePriorityScore(entry.window, entry.consecutiveEmpty),
            runsRecorded: entry.runsRecorded,
            window: [...entry.window],
            deactivationReason: entry.deactivationReason,
        };
    }
}
