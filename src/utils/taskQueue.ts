import { log } from 'crawlee';

export type QueuedTask = () => Promise<void>;

/**
 * FIFO task queue with a fixed number of concurrent slots.
 *
 * The orchestrator uses one with `concurrency` slots for adapter fetches and
 * one with a single slot so reconciliation passes never overlap. Tasks are
 * expected to handle their own errors; a rejection is logged and the slot
 * is released.
 */
export class TaskQueue {
    private readonly queued: QueuedTask[] = [];
    private active = 0;
    private drainResolvers: Array<() => void> = [];

    constructor(
        private readonly concurrency: number,
        private readonly label = 'TaskQueue'
    ) {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(`${label} concurrency must be a positive integer, got ${concurrency}`);
        }
    }

    enqueue(task: QueuedTask): void {
        this.queued.push(task);
        this.pump();
    }

    /** Resolves once nothing is queued or running. */
    async drain(): Promise<void> {
        if (this.active === 0 && this.queued.length === 0) return;
        await new Promise<void>((resolve) => {
            this.drainResolvers.push(resolve);
        });
    }

    get stats(): { active: number; queued: number } {
        return { active: this.active, queued: this.queued.length };
    }

    private pump(): void {
        while (this.active < this.concurrency && this.queued.length > 0) {
            const task = this.queued.shift();
            if (!task) break;

            this.active++;
            void Promise.resolve()
                .then(task)
                .catch((err: unknown) => {
                    log.error(`[${this.label}] Task failed: ${err instanceof Error ? err.message : String(err)}`);
                })
                .finally(() => {
                    this.active = Math.max(0, this.active - 1);
                    this.pump();
                    this.resolveDrainersIfIdle();
                });
        }
    }

    private resolveDrainersIfIdle(): void {
        if (this.active !== 0 || this.queued.length !== 0) return;
        const waiters = this.drainResolvers;
        this.drainResolvers = [];
        for (const resolve of waiters) {
            resolve();
        }
    }
}
