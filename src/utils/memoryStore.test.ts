import { describe, it, expect } from 'vitest';
import { makeOutcome, makePosting, makeRun, newSource } from '../testing/fixtures.js';
import type { NewPosting, SourceHealthFields } from '../sources/types.js';
import type { ReconcileResult } from './dedup.js';
import { InMemoryJobStore } from './memoryStore.js';

const NOW = '2026-03-02T09:00:00.000Z';

function draft(fingerprint: string, title = `Role ${fingerprint}`): NewPosting {
    const url = `https://jobs.example.com/${fingerprint}`;
    return {
        sourceId: 'acme',
        fingerprint,
        title,
        url,
        canonicalUrl: url,
        location: null,
        postedAt: null,
        description: null,
        firstSeenAt: NOW,
        lastSeenAt: NOW,
        missCount: 0,
        archived: false,
        archivedAt: null,
    };
}

const health = (over: Partial<SourceHealthFields>): SourceHealthFields => ({
    active: true,
    consecutiveEmpty: 0,
    consecutiveFailures: 0,
    successRate: null,
    priorityScore: 1,
    lastCrawledAt: null,
    deactivatedAt: null,
    deactivationReason: null,
    rateLimitedUntil: null,
    ...over,
});

const pass = (over: Partial<ReconcileResult>): ReconcileResult => ({
    created: [], updated: [], unchanged: [], missed: [], archived: [], duplicateCandidates: 0,
    ...over,
});

describe('InMemoryJobStore', () => {
    it('orders sources by priority then id and filters them', async () => {
        const store = new InMemoryJobStore([newSource('beta'), newSource('alpha'), newSource('gamma')]);
        await store.saveSourceHealth('gamma', health({ priorityScore: 2 }));
        await store.saveSourceHealth('beta', health({ active: false }));

        expect((await store.listSources()).map((s) => s.id)).toEqual(['gamma', 'alpha', 'beta']);
        expect((await store.listSources({ activeOnly: true })).map((s) => s.id)).toEqual(['gamma', 'alpha']);
        expect((await store.listSources({ ids: ['beta', 'nope'] })).map((s) => s.id)).toEqual(['beta']);
    });

    it('keeps health fields when a source is re-registered', async () => {
        const store = new InMemoryJobStore([newSource('acme')]);
        await store.saveSourceHealth('acme', health({ consecutiveEmpty: 4 }));

        const updated = await store.upsertSource({ ...newSource('acme'), name: 'Acme Robotics' });
        expect(updated.name).toBe('Acme Robotics');
        expect(updated.consecutiveEmpty).toBe(4);
    });

    it('reactivates a source and clears its streaks', async () => {
        const store = new InMemoryJobStore([newSource('acme')]);
        await store.saveSourceHealth('acme', health({
            active: false,
            consecutiveEmpty: 5,
            consecutiveFailures: 5,
            deactivatedAt: NOW,
            deactivationReason: '5 consecutive failures',
        }));

        expect(await store.reactivateSource('acme')).toMatchObject({
            active: true,
            consecutiveEmpty: 0,
            consecutiveFailures: 0,
            deactivatedAt: null,
            deactivationReason: null,
        });
        expect(await store.reactivateSource('nope')).toBeNull();
    });

    it('assigns ids to new postings and upserts on fingerprint', async () => {
        const store = new InMemoryJobStore([newSource('acme')]);

        const first = await store.applyReconciliation('acme', pass({ created: [draft('a'), draft('b')] }));
        expect(first.map((p) => p.id)).toEqual(['1', '2']);

        const again = await store.applyReconciliation('acme', pass({ created: [draft('a', 'Renamed')] }));
        expect(again.map((p) => [p.id, p.title])).toEqual([['1', 'Renamed']]);
        expect(store.allPostings()).toHaveLength(2);
    });

    it('applies updates and archives to stored postings only', async () => {
        const store = new InMemoryJobStore([newSource('acme')]);
        const [stored] = await store.applyReconciliation('acme', pass({ created: [draft('a')] }));

        await store.applyReconciliation('acme', pass({
            archived: [{ ...stored, missCount: 3, archived: true, archivedAt: NOW }],
            updated: [makePosting({ id: '99' })],
        }));

        expect(await store.loadPostings('acme')).toEqual([
            { ...stored, missCount: 3, archived: true, archivedAt: NOW },
        ]);
    });

    it('retires a source by archiving its open postings', async () => {
        const store = new InMemoryJobStore([newSource('acme'), newSource('globex')]);
        await store.applyReconciliation('acme', pass({ created: [draft('a'), draft('b')] }));
        await store.applyReconciliation('globex', pass({ created: [{ ...draft('c'), sourceId: 'globex' }] }));

        const retired = await store.retireSource('acme', NOW);

        expect(retired?.archivedPostings).toBe(2);
        expect(retired?.source).toMatchObject({ active: false, deactivatedAt: NOW, deactivationReason: 'retired by operator' });
        expect((await store.loadPostings('acme')).map((p) => [p.archived, p.archivedAt])).toEqual([[true, NOW], [true, NOW]]);
        expect((await store.loadPostings('globex'))[0].archived).toBe(false);
        expect(await store.retireSource('nope', NOW)).toBeNull();
    });

    it('hands out copies', async () => {
        const store = new InMemoryJobStore([newSource('acme')]);
        const [created] = await store.applyReconciliation('acme', pass({ created: [draft('a')] }));
        created.title = 'mutated';
        expect((await store.loadPostings('acme'))[0].title).toBe('Role a');
    });

    it('records outcomes once per run and source', async () => {
        const store = new InMemoryJobStore([newSource('acme')]);
        await store.recordOutcome('run-1', makeOutcome({ sourceId: 'acme', jobsFound: 3 }));
        await store.recordOutcome('run-1', makeOutcome({ sourceId: 'acme', jobsFound: 9 }));
        await store.recordOutcome('run-2', makeOutcome({ sourceId: 'acme', status: 'error', errorKind: 'PersistenceError' }));
        await store.recordOutcome('run-3', makeOutcome({ sourceId: 'acme', status: 'empty' }));
        await store.recordOutcome('run-4', makeOutcome({ sourceId: 'acme', status: 'timeout', errorKind: 'Timeout', interrupted: true }));

        expect(await store.loadOutcomeHistory('acme', 10)).toEqual([
            { status: 'success', errorKind: null, jobsFound: 3 },
            { status: 'empty', errorKind: null, jobsFound: 0 },
        ]);
        expect(await store.loadOutcomeHistory('acme', 1)).toEqual([
            { status: 'empty', errorKind: null, jobsFound: 0 },
        ]);
    });

    it('tracks running and recent runs', async () => {
        const store = new InMemoryJobStore();
        await store.saveRun(makeRun({ id: 'old', startedAt: '2026-03-01T09:00:00.000Z' }));
        await store.saveRun(makeRun({ id: 'live', state: 'running', finishedAt: null, requestedSourceIds: ['acme'] }));

        expect(await store.listActiveRuns()).toEqual([
            { id: 'live', requestedSourceIds: ['acme'], startedAt: NOW },
        ]);
        expect((await store.listRecentRuns(1)).map((r) => r.id)).toEqual(['live']);
    });

    it('rejects every call while failing', async () => {
        const store = new InMemoryJobStore([newSource('acme')]);
        store.failWith = new Error('connection refused');

        expect(await store.ping()).toBe(false);
        await expect(store.listSources()).rejects.toThrow('connection refused');
        await expect(store.saveRun(makeRun())).rejects.toThrow('connection refused');
    });
});
