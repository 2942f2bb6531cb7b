import { describe, it, expect } from 'vitest';
import { DEFAULT_CRAWL_POLICY } from './config/crawlPolicy.js';
import { CrawlOrchestrator } from './orchestrator.js';
import { CrawlScheduler } from './scheduler.js';
import { createAdapterRegistry } from './sources/registry.js';
import type { AdapterResult, Source, SourceAdapter } from './sources/types.js';
import { FakeHttpClient, makeRun, newSource } from './testing/fixtures.js';
import { InMemoryJobStore } from './utils/memoryStore.js';

/** Adapter whose fetches wait until `release()` is called. */
class HeldAdapter implements SourceAdapter {
    readonly kind = 'ats-json' as const;
    private releases: Array<() => void> = [];

    fetch(source: Source): Promise<AdapterResult> {
        return new Promise((resolve) => {
            this.releases.push(() => resolve({
                candidates: [{ title: 'Platform Engineer', url: `https://jobs.example.com/${source.id}/1` }],
                dropped: 0,
            }));
        });
    }

    release(): void {
        for (const release of this.releases.splice(0)) release();
    }
}

function setup() {
    const store = new InMemoryJobStore([newSource('acme')]);
    const adapter = new HeldAdapter();
    const orchestrator = new CrawlOrchestrator({
        store,
        policy: { ...DEFAULT_CRAWL_POLICY, sourceTimeoutMs: 2_000 },
        http: new FakeHttpClient(),
        registry: createAdapterRegistry({ 'ats-json': adapter }),
    });
    const scheduler = new CrawlScheduler(orchestrator, { intervalMs: 60_000, runOnStart: false });
    return { store, adapter, scheduler };
}

describe('CrawlScheduler', () => {
    it('starts scheduled runs', async () => {
        const { adapter, scheduler } = setup();

        const handle = await scheduler.tick();
        expect(handle?.trigger).toBe('scheduled');

        adapter.release();
        expect((await handle?.done)?.state).toBe('completed');
    });

    it('skips a tick while the previous run is going', async () => {
        const { adapter, scheduler } = setup();

        const first = await scheduler.tick();
        expect(await scheduler.tick()).toBeNull();

        adapter.release();
        await first?.done;
        const next = await scheduler.tick();
        expect(next).not.toBeNull();
        adapter.release();
        await next?.done;
    });

    it('skips a tick that conflicts with another process', async () => {
        const { store, scheduler } = setup();
        await store.saveRun(makeRun({ id: 'elsewhere', state: 'running', finishedAt: null, startedAt: new Date().toISOString() }));

        expect(await scheduler.tick()).toBeNull();
    });

    it('cancels the active run on stop', async () => {
        const { adapter, scheduler } = setup();
        scheduler.start();
        expect(scheduler.running).toBe(true);

        await scheduler.tick();
        const stopping = scheduler.stop('shutdown');
        adapter.release();
        const run = await stopping;

        expect(scheduler.running).toBe(false);
        expect(run?.state).toBe('cancelled');
        expect(run?.cancelReason).toBe('shutdown');
        expect(run?.outcomes).toHaveLength(1);
    });

    it('stops cleanly with nothing running', async () => {
        const { scheduler } = setup();
        scheduler.start();
        expect(await scheduler.stop()).toBeNull();
        expect(scheduler.running).toBe(false);
    });
});
