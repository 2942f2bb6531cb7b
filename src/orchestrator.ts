/**
 * src/orchestrator.ts
 *
 * CRAWL ORCHESTRATOR
 *
 * One CrawlRun moves through:
 *
 *   idle → running → completed | cancelled | failed
 *
 *  1. Preflight: store reachable, no running run overlaps the requested
 *     sources, working set = active sources ordered by priority score,
 *     minus sources still inside a server's Retry-After window.
 *  2. Dispatch: adapter fetches run in a bounded pool. Each call gets its
 *     own AbortController (per-source timeout) and transient failures are
 *     retried with exponential backoff inside that budget.
 *  3. Commit: as each source resolves, reconciliation + persistence + health
 *     update run on a single-slot queue, so no two passes overlap and every
 *     finished source is durable even if the run is later cancelled.
 *  4. Finalize: totals, run record saved, listeners notified.
 *
 * A failing source never aborts the run. `failed` is reserved for faults
 * outside any single source (store unreachable, source listing broken).
 */

import { log } from 'crawlee';
import type { CrawlPolicy } from './config/crawlPolicy.js';
import {
    CrawlError,
    RateLimitedError,
    RunConflictError,
    TimeoutError,
    errorMessage,
    toCrawlError,
} from './sources/errors.js';
import { createAdapterRegistry, type AdapterRegistry } from './sources/registry.js';
import { configuredTimeoutMs } from './sources/sourceConfig.js';
import type {
    AdapterContext,
    AdapterResult,
    CrawlRun,
    JobExtractor,
    JobPosting,
    PageRenderer,
    RunListener,
    RunState,
    RunTotals,
    RunTrigger,
    Source,
    SourceOutcome,
} from './sources/types.js';
import { computeBackoffDelay, sleep } from './utils/backoff.js';
import { reconcile } from './utils/dedup.js';
import { HealthTracker } from './utils/healthTracker.js';
import type { HttpClient } from './utils/httpClient.js';
import type { JobStore } from './utils/jobStore.js';
import { createRunContext } from './utils/runContext.js';
import { TaskQueue } from './utils/taskQueue.js';

// ─── Public types ─────────────────────────────────────────────────────────────

export interface OrchestratorDeps {
    store: JobStore;
    policy: CrawlPolicy;
    http: HttpClient;
    registry?: AdapterRegistry;
    extractor?: JobExtractor;
    renderer?: PageRenderer;
    listeners?: RunListener[];
    tracker?: HealthTracker;
    now?: () => Date;
    random?: () => number;
}

export interface StartRunOptions {
    /** Restrict the run to these sources; omitted means every active source. */
    sourceIds?: readonly string[];
    trigger?: RunTrigger;
}

export interface RunHandle {
    readonly id: string;
    readonly trigger: RunTrigger;
    readonly state: RunState;
    /** Stops new dispatches; in-flight fetches finish or time out. */
    cancel(reason?: string): void;
    /** Resolves with the finalized run. Never rejects. */
    readonly done: Promise<CrawlRun>;
}

// ─── Internals ────────────────────────────────────────────────────────────────

/** Longest Retry-After honoured; a later HTTP date is clamped to this. */
const MAX_RETRY_AFTER_MS = 24 * 60 * 60_000;

interface FetchResult {
    result: AdapterResult | null;
    error: CrawlError | null;
    attempts: number;
    startedAt: Date;
}

class ActiveRun {
    cancelled = false;
    readonly controllers = new Set<AbortController>();

    constructor(readonly run: CrawlRun) {}

    cancel(reason: string): void {
        if (this.cancelled || this.run.state === 'completed' || this.run.state === 'failed') return;
        this.cancelled = true;
        this.run.cancelReason = reason;
        log.info(`[Orchestrator] Run ${this.run.id} cancelling: ${reason}`);
    }

    abortInFlight(reason: CrawlError): void {
        for (const controller of this.controllers) {
            controller.abort(reason);
        }
    }
}

export function emptyTotals(): RunTotals {
    return { sources: 0, succeeded: 0, empty: 0, failed: 0, jobsFound: 0, newJobs: 0, updatedJobs: 0, archivedJobs: 0 };
}

export function computeTotals(outcomes: readonly SourceOutcome[]): RunTotals {
    const totals = emptyTotals();
    for (const o of outcomes) {
        totals.sources++;
        if (o.status === 'success') totals.succeeded++;
        else if (o.status === 'empty') totals.empty++;
        else totals.failed++;
        totals.jobsFound += o.jobsFound;
        totals.newJobs += o.newJobs;
        totals.updatedJobs += o.updatedJobs;
        totals.archivedJobs += o.archivedJobs;
    }
    return totals;
}

function overlaps(a: readonly string[] | null, b: readonly string[] | null): boolean {
    if (a === null || b === null) return true;
    return a.some((id) => b.includes(id));
}

/** Rejects with the signal's reason as soon as it aborts, whatever `promise` does. */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) return Promise.reject(signal.reason);
    return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => reject(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
        void promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (err: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(err);
            }
        );
    });
}

function rateLimitedUntil(error: CrawlError | null, finished: Date): string | null {
    if (!(error instanceof RateLimitedError) || error.retryAfterMs === null) return null;
    return new Date(finished.getTime() + Math.min(error.retryAfterMs, MAX_RETRY_AFTER_MS)).toISOString();
}

function abortError(signal: AbortSignal): CrawlError {
    return signal.reason instanceof CrawlError ? signal.reason : new TimeoutError('Adapter call aborted');
}

// ─── Orchestrator ─────────────────────────────────────────────────────────────

export class CrawlOrchestrator {
    private readonly store: JobStore;
    private readonly policy: CrawlPolicy;
    private readonly http: HttpClient;
    private readonly registry: AdapterRegistry;
    private readonly extractor?: JobExtractor;
    private readonly renderer?: PageRenderer;
    private readonly listeners: RunListener[];
    private readonly tracker: HealthTracker;
    private readonly now: () => Date;
    private readonly random: () => number;
    private readonly active = new Map<string, ActiveRun>();

    constructor(deps: OrchestratorDeps) {
        this.store = deps.store;
        this.policy = deps.policy;
        this.http = deps.http;
        this.registry = deps.registry ?? createAdapterRegistry();
        this.extractor = deps.extractor;
        this.renderer = deps.renderer;
        this.listeners = deps.listeners ?? [];
        this.tracker = deps.tracker ?? new HealthTracker(deps.policy);
        this.now = deps.now ?? (() => new Date());
        this.random = deps.random ?? Math.random;
    }

    addListener(listener: RunListener): void {
        this.listeners.push(listener);
    }

    /** Ids of runs started by this orchestrator that have not finalized. */
    activeRunIds(): string[] {
        return [...this.active.keys()];
    }

    /**
     * Cancels every active run. With `abortInFlight`, in-flight fetches are
     * aborted as interrupted timeouts, which do not count against source health.
     */
    cancelAll(reason: string, options: { abortInFlight?: boolean } = {}): void {
        for (const run of this.active.values()) {
            run.cancel(reason);
            if (options.abortInFlight) {
                run.abortInFlight(new TimeoutError(`Aborted: ${reason}`, { interrupted: true }));
            }
        }
    }

    /**
     * Starts a run and returns once it is `running` (or already `failed`).
     * Throws RunConflictError when a running run covers any requested source.
     */
    async startRun(options: StartRunOptions = {}): Promise<RunHandle> {
        const requested = options.sourceIds ? [...new Set(options.sourceIds)] : null;
        const ctx = createRunContext(this.now());
        const active = new ActiveRun({
            id: ctx.runId,
            state: 'idle',
            trigger: options.trigger ?? 'manual',
            requestedSourceIds: requested,
            startedAt: ctx.startedAt,
            finishedAt: null,
            outcomes: [],
            totals: emptyTotals(),
            deactivatedSourceIds: [],
            skippedSourceIds: [],
            failureReason: null,
            cancelReason: null,
        });

        for (const other of this.active.values()) {
            if (overlaps(requested, other.run.requestedSourceIds)) {
                throw new RunConflictError(other.run.id);
            }
        }
        this.active.set(active.run.id, active);

        if (!(await this.store.ping())) {
            return this.failEarly(active, 'Job store is unreachable');
        }

        let conflictingRunId: string | null;
        try {
            conflictingRunId = await this.findStoredConflict(requested);
        } catch (err) {
            return this.failEarly(active, `Could not list running runs: ${errorMessage(err)}`);
        }
        if (conflictingRunId) {
            this.active.delete(active.run.id);
            throw new RunConflictError(conflictingRunId);
        }

        let sources: Source[];
        try {
            sources = await this.store.listSources({ activeOnly: true, ids: requested ?? undefined });
            active.run.state = 'running';
            await this.store.saveRun(active.run);
        } catch (err) {
            return this.failEarly(active, `Could not start run: ${errorMessage(err)}`);
        }

        const done = this.execute(active, sources).catch((err: unknown) => this.failLate(active, err));
        return this.handleFor(active, done);
    }

    // ─── Preflight ────────────────────────────────────────────────────────────

    private async findStoredConflict(requested: string[] | null): Promise<string | null> {
        const nowMs = this.now().getTime();
        const running = await this.store.listActiveRuns();
        for (const other of running) {
            if (this.active.has(other.id)) continue;
            const age = nowMs - Date.parse(other.startedAt);
            if (age > this.policy.staleRunAfterMs) {
                log.warning(`[Orchestrator] Ignoring stale running run ${other.id} (started ${other.startedAt})`);
                continue;
            }
            if (overlaps(requested, other.requestedSourceIds)) return other.id;
        }
        return null;
    }

    private handleFor(active: ActiveRun, done: Promise<CrawlRun>): RunHandle {
        return {
            id: active.run.id,
            trigger: active.run.trigger,
            get state() {
                return active.run.state;
            },
            cancel: (reason = 'cancelled by operator') => active.cancel(reason),
            done,
        };
    }

    private async failEarly(active: ActiveRun, reason: string): Promise<RunHandle> {
        const run = await this.fail(active, reason);
        return this.handleFor(active, Promise.resolve(run));
    }

    private failLate(active: ActiveRun, err: unknown): Promise<CrawlRun> {
        return this.fail(active, `Run aborted by an internal error: ${errorMessage(err)}`);
    }

    private async fail(active: ActiveRun, reason: string): Promise<CrawlRun> {
        const { run } = active;
        log.error(`[Orchestrator] Run ${run.id} failed: ${reason}`);
        run.state = 'failed';
        run.failureReason = reason;
        run.finishedAt = this.now().toISOString();
        run.totals = computeTotals(run.outcomes);
        try {
            await this.store.saveRun(run);
        } catch (err) {
            log.error(`[Orchestrator] Could not record failed run ${run.id}: ${errorMessage(err)}`);
        }
        this.active.delete(run.id);
        await this.notify(run, []);
        return run;
    }

    // ─── Dispatch ─────────────────────────────────────────────────────────────

    private async execute(active: ActiveRun, sources: Source[]): Promise<CrawlRun> {
        const { run } = active;
        const ordered = this.dispatchable(sources, run).sort(
            (a, b) => b.priorityScore - a.priorityScore || a.id.localeCompare(b.id)
        );
        const fetchQueue = new TaskQueue(this.policy.concurrency, 'FetchPool');
        const commitQueue = new TaskQueue(1, 'Reconcile');
        const newPostings: JobPosting[] = [];

        log.info(
            `[Orchestrator] Run ${run.id} started (${run.trigger}): ` +
            `${ordered.length} sources, concurrency ${this.policy.concurrency}`
        );

        const runTimer = setTimeout(() => {
            const reason = `run timeout after ${this.policy.runTimeoutMs}ms`;
            active.cancel(reason);
            active.abortInFlight(new TimeoutError(reason));
        }, this.policy.runTimeoutMs);

        try {
            for (const source of ordered) {
                fetchQueue.enqueue(async () => {
                    if (active.cancelled) {
                        run.skippedSourceIds.push(source.id);
                        return;
                    }
                    const fetched = await this.fetchSource(source, active);
                    commitQueue.enqueue(() => this.commitSource(source, fetched, active, newPostings));
                });
            }
            await fetchQueue.drain();
            await commitQueue.drain();
        } finally {
            clearTimeout(runTimer);
        }

        return this.finalize(active, newPostings);
    }

    /** Drops sources a server asked us to leave alone for now; they count as skipped. */
    private dispatchable(sources: readonly Source[], run: CrawlRun): Source[] {
        const nowMs = this.now().getTime();
        const ready: Source[] = [];
        for (const source of sources) {
            if (source.rateLimitedUntil !== null && Date.parse(source.rateLimitedUntil) > nowMs) {
                log.info(`[Orchestrator] ${source.name}: rate limited until ${source.rateLimitedUntil}; not dispatched`);
                run.skippedSourceIds.push(source.id);
                continue;
            }
            ready.push(source);
        }
        return ready;
    }

    private async fetchSource(source: Source, active: ActiveRun): Promise<FetchResult> {
        const startedAt = this.now();
        const adapter = this.registry[source.adapterKind];
        const timeoutMs = configuredTimeoutMs(source.config) ?? this.policy.sourceTimeoutMs;
        const controller = new AbortController();
        active.controllers.add(controller);
        const timer = setTimeout(() => {
            controller.abort(new TimeoutError(`${source.name} exceeded ${timeoutMs}ms`));
        }, timeoutMs);

        const context: AdapterContext = {
            signal: controller.signal,
            http: this.http,
            extractor: this.extractor,
            renderer: this.renderer,
            timeoutMs,
            aiBudgetChars: this.policy.aiBudgetChars,
        };

        let attempts = 0;
        try {
            for (;;) {
                attempts++;
                try {
                    const result = await raceAbort(adapter.fetch(source, context), controller.signal);
                    return { result, error: null, attempts, startedAt };
                } catch (err) {
                    const error = controller.signal.aborted ? abortError(controller.signal) : toCrawlError(err);
                    if (!error.retryable || attempts >= this.policy.retry.maxAttempts || active.cancelled) {
                        return { result: null, error, attempts, startedAt };
                    }
                    const delay = computeBackoffDelay(attempts, this.policy.retry, this.random);
                    log.debug(`[Orchestrator] ${source.name}: ${error.message}; retry ${attempts + 1} in ${delay}ms`);
                    try {
                        await sleep(delay, controller.signal);
                    } catch {
                        return { result: null, error: abortError(controller.signal), attempts, startedAt };
                    }
                }
            }
        } finally {
            clearTimeout(timer);
            active.controllers.delete(controller);
        }
    }

    // ─── Commit ───────────────────────────────────────────────────────────────

    private async commitSource(
        source: Source,
        fetched: FetchResult,
        active: ActiveRun,
        newPostings: JobPosting[]
    ): Promise<void> {
        const { run } = active;
        const finished = this.now();
        const outcome: SourceOutcome = {
            sourceId: source.id,
            sourceName: source.name,
            adapterKind: source.adapterKind,
            status: 'empty',
            errorKind: null,
            errorDetail: null,
            jobsFound: 0,
            newJobs: 0,
            updatedJobs: 0,
            unchangedJobs: 0,
            archivedJobs: 0,
            droppedCandidates: 0,
            attempts: fetched.attempts,
            startedAt: fetched.startedAt.toISOString(),
            finishedAt: finished.toISOString(),
            durationMs: finished.getTime() - fetched.startedAt.getTime(),
            deactivated: false,
            interrupted: fetched.error instanceof TimeoutError && fetched.error.interrupted,
        };

        if (fetched.error) {
            outcome.status = fetched.error.kind === 'Timeout' ? 'timeout' : 'error';
            outcome.errorKind = fetched.error.kind;
            outcome.errorDetail = fetched.error.message;
            log.warning(`[Orchestrator] ${source.name}: ${fetched.error.kind}: ${fetched.error.message}`);
        } else if (fetched.result) {
            await this.reconcileSource(source, fetched.result, outcome, newPostings);
        }

        if (outcome.errorKind !== 'PersistenceError' && !outcome.interrupted) {
            await this.updateHealth(source, outcome, run, rateLimitedUntil(fetched.error, finished));
        }

        run.outcomes.push(outcome);
        try {
            await this.store.recordOutcome(run.id, outcome);
        } catch (err) {
            log.warning(`[Orchestrator] Could not record outcome for ${source.id}: ${errorMessage(err)}`);
        }
    }

    private async reconcileSource(
        source: Source,
        result: AdapterResult,
        outcome: SourceOutcome,
        newPostings: JobPosting[]
    ): Promise<void> {
        outcome.jobsFound = result.candidates.length;
        outcome.droppedCandidates = result.dropped;

        if (result.annotation) {
            outcome.status = 'empty';
            outcome.errorKind = result.annotation.kind;
            outcome.errorDetail = result.annotation.detail;
            return;
        }

        outcome.status = result.candidates.length > 0 ? 'success' : 'empty';
        try {
            const existing = await this.store.loadPostings(source.id);
            const reconciled = reconcile(source.id, existing, result.candidates, {
                archiveAfterMisses: this.policy.archiveAfterMisses,
                now: outcome.finishedAt,
            });
            const created = await this.store.applyReconciliation(source.id, reconciled);
            newPostings.push(...created);
            outcome.newJobs = created.length;
            outcome.updatedJobs = reconciled.updated.length;
            outcome.unchangedJobs = reconciled.unchanged.length;
            outcome.archivedJobs = reconciled.archived.length;
            log.info(
                `[Orchestrator] ${source.name}: ${outcome.jobsFound} found, ${outcome.newJobs} new, ` +
                `${outcome.updatedJobs} updated, ${outcome.archivedJobs} archived`
            );
        } catch (err) {
            outcome.status = 'error';
            outcome.errorKind = 'PersistenceError';
            outcome.errorDetail = errorMessage(err);
            log.error(`[Orchestrator] ${source.name}: persistence failed: ${outcome.errorDetail}`);
        }
    }

    private async updateHealth(
        source: Source,
        outcome: SourceOutcome,
        run: CrawlRun,
        rateLimitedUntil: string | null
    ): Promise<void> {
        try {
            // Re-read history when the stored record was reactivated behind the tracker's back.
            if (!this.tracker.isHydrated(source.id) || this.tracker.currentState(source.id).active !== source.active) {
                // Enough history to tell whether the grace period is over, even past the window.
                const limit = Math.max(this.policy.healthWindowSize, this.policy.graceRuns);
                const history = await this.store.loadOutcomeHistory(source.id, limit);
                this.tracker.hydrate(source, history);
            }
            const change = this.tracker.recordOutcome(source.id, outcome);
            if (change.deactivated) {
                outcome.deactivated = true;
                run.deactivatedSourceIds.push(source.id);
            }
            const { state } = change;
            await this.store.saveSourceHealth(source.id, {
                active: state.active,
                consecutiveEmpty: state.consecutiveEmpty,
                consecutiveFailures: state.consecutiveFailures,
                successRate: state.successRate,
                priorityScore: state.priorityScore,
                lastCrawledAt: outcome.finishedAt,
                deactivatedAt: state.active ? null : (change.deactivated ? outcome.finishedAt : source.deactivatedAt),
                deactivationReason: state.deactivationReason,
                rateLimitedUntil,
            });
        } catch (err) {
            log.error(`[Orchestrator] Could not update health for ${source.id}: ${errorMessage(err)}`);
        }
    }

    // ─── Finalize ─────────────────────────────────────────────────────────────

    private async finalize(active: ActiveRun, newPostings: JobPosting[]): Promise<CrawlRun> {
        const { run } = active;
        run.state = active.cancelled ? 'cancelled' : 'completed';
        run.finishedAt = this.now().toISOString();
        run.totals = computeTotals(run.outcomes);

        try {
            await this.store.saveRun(run);
        } catch (err) {
            log.error(`[Orchestrator] Could not save run ${run.id}: ${errorMessage(err)}`);
        }
        this.active.delete(run.id);

        const t = run.totals;
        log.info(
            `[Orchestrator] Run ${run.id} ${run.state}: ${t.sources} sources ` +
            `(${t.succeeded} ok, ${t.empty} empty, ${t.failed} failed), ${t.newJobs} new jobs, ` +
            `${run.skippedSourceIds.length} skipped, ${run.deactivatedSourceIds.length} deactivated`
        );

        await this.notify(run, newPostings);
        return run;
    }

    private async notify(run: CrawlRun, newPostings: JobPosting[]): Promise<void> {
        for (const listener of this.listeners) {
            try {
                await listener.onRunFinished(run, newPostings);
            } catch (err) {
                log.warning(`[Orchestrator] Run listener failed: ${errorMessage(err)}`);
            }
        }
    }
}
