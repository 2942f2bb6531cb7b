/**
 * src/scheduler.ts
 *
 * Starts a `scheduled` crawl run every CRAWL_INTERVAL_MINUTES. A tick that
 * lands while the previous run is still going is skipped rather than queued.
 */

import { log } from 'crawlee';
import type { CrawlOrchestrator, RunHandle } from './orchestrator.js';
import { RunConflictError, errorMessage } from './sources/errors.js';
import type { CrawlRun } from './sources/types.js';

export interface SchedulerOptions {
    intervalMs: number;
    sourceIds?: readonly string[];
    /** Start a run immediately instead of waiting for the first interval. */
    runOnStart?: boolean;
}

export class CrawlScheduler {
    private timer: NodeJS.Timeout | null = null;
    private current: RunHandle | null = null;
    private ticking = false;

    constructor(
        private readonly orchestrator: CrawlOrchestrator,
        private readonly options: SchedulerOptions
    ) {}

    start(): void {
        if (this.timer) return;
        log.info(`[Scheduler] Crawling every ${Math.round(this.options.intervalMs / 60_000)} min`);
        this.timer = setInterval(() => void this.tick(), this.options.intervalMs);
        if (this.options.runOnStart ?? true) void this.tick();
    }

    get running(): boolean {
        return this.timer !== null;
    }

    /** Starts one scheduled run unless one is still in progress. Returns the run it started. */
    async tick(): Promise<RunHandle | null> {
        if (this.ticking || (this.current && this.current.state === 'running')) {
            log.info('[Scheduler] Previous run still in progress, skipping this tick');
            return null;
        }

        this.ticking = true;
        try {
            const handle = await this.orchestrator.startRun({
                trigger: 'scheduled',
                sourceIds: this.options.sourceIds,
            });
            this.current = handle;
            void handle.done.then((run) => this.onFinished(run));
            return handle;
        } catch (err) {
            if (err instanceof RunConflictError) {
                log.info(`[Scheduler] Skipping tick: ${err.message}`);
            } else {
                log.error(`[Scheduler] Could not start run: ${errorMessage(err)}`);
            }
            return null;
        } finally {
            this.ticking = false;
        }
    }

    /** Stops scheduling and cancels the active run, waiting for it to finalize. */
    async stop(reason = 'scheduler stopped'): Promise<CrawlRun | null> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        const current = this.current;
        if (!current) return null;
        current.cancel(reason);
        return current.done;
    }

    private onFinished(run: CrawlRun): void {
        log.info(`[Scheduler] Run ${run.id} finished as ${run.state}`);
    }
}
